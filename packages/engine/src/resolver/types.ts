import type { SymlinkPolicy } from '@filewarden/shared';

export interface ResolveOptions {
  /** Files or directories to monitor; directories are walked recursively */
  include: string[];
  /** Files or directories removed from the result, together with everything below them */
  exclude: string[];
  /** gitignore-style patterns, matched relative to the include entry being walked */
  ignorePatterns?: string[];
  symlinks?: SymlinkPolicy;
}

/**
 * Non-fatal problem met while expanding include entries. The entry contributes nothing
 * and resolution carries on.
 */
export interface PathResolutionWarning {
  path: string;
  message: string;
}

export interface ResolvedPaths {
  /** Absolute, normalized, deduplicated and sorted */
  files: string[];
  warnings: PathResolutionWarning[];
}
