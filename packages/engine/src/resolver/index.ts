import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import {
  comparePaths,
  errorCode,
  isDescendantOrEqual,
  join,
  relative,
  resolve,
} from '@filewarden/shared';
import type { PathResolutionWarning, ResolveOptions, ResolvedPaths } from './types';

export * from './types';

type Fs = typeof nodeFs;

/**
 * Expands include/exclude rules into the concrete set of regular files to fingerprint.
 */
export class PathResolver {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async resolve(options: ResolveOptions): Promise<ResolvedPaths> {
    const excludes = options.exclude.map((p) => resolve(p));
    const symlinks = options.symlinks ?? 'follow';
    const patterns = options.ignorePatterns ?? [];
    const ig = ignore().add(patterns);
    // `ignore` throws on names such as `...`; no pattern can match them anyway.
    const isIgnored = (rel: string) =>
      patterns.length > 0 && ignore.isPathValid(rel) && ig.ignores(rel);
    const found = new Set<string>();
    const warnings: PathResolutionWarning[] = [];

    const isExcluded = (p: string) => excludes.some((e) => isDescendantOrEqual(p, e));

    const walk = async (dir: string, root: string) => {
      let entries;
      try {
        entries = await this.fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        warnings.push({
          path: dir,
          message: `Cannot read directory ${dir} (${errorCode(error) ?? String(error)}). Skipping.`,
        });
        return;
      }

      for (const entry of entries) {
        const entryPath = join(dir, entry.name);
        if (isExcluded(entryPath)) continue;
        const rel = relative(root, entryPath);

        if (entry.isDirectory()) {
          // For directories, append slash to match directory patterns in ignore
          if (isIgnored(rel + '/')) continue;
          await walk(entryPath, root);
        } else if (entry.isFile()) {
          if (isIgnored(rel)) continue;
          found.add(entryPath);
        } else if (entry.isSymbolicLink()) {
          if (symlinks === 'skip' || isIgnored(rel)) continue;
          // Symlinked directories are never descended into.
          if (await this.isRegularFile(entryPath)) {
            found.add(entryPath);
          }
        }
        // Sockets, FIFOs and devices are not monitored.
      }
    };

    for (const entry of options.include) {
      const abs = resolve(entry);
      if (isExcluded(abs)) continue;

      let stats;
      try {
        // Include entries are followed even when they are symlinks: they were named explicitly.
        stats = await this.fs.stat(abs);
      } catch (error) {
        const code = errorCode(error);
        warnings.push({
          path: abs,
          message:
            code === 'ENOENT'
              ? `Include path '${abs}' does not exist. Skipping.`
              : `Cannot access include path '${abs}' (${code ?? String(error)}). Skipping.`,
        });
        continue;
      }

      if (stats.isDirectory()) {
        await walk(abs, abs);
      } else if (stats.isFile()) {
        if (!isIgnored(path.basename(abs))) {
          found.add(abs);
        }
      } else {
        warnings.push({
          path: abs,
          message: `Include path '${abs}' is not a regular file or directory. Skipping.`,
        });
      }
    }

    return {
      files: [...found].sort(comparePaths),
      warnings,
    };
  }

  private async isRegularFile(p: string): Promise<boolean> {
    try {
      return (await this.fs.stat(p)).isFile();
    } catch {
      // Dangling link: nothing to fingerprint.
      return false;
    }
  }
}
