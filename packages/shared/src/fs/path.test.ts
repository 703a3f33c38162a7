import { describe, it, expect } from 'vitest';
import {
  join,
  normalizePath,
  relative,
  dirname,
  resolve,
  isDescendantOrEqual,
  comparePaths,
} from './path';

describe('path', () => {
  describe('normalizePath', () => {
    it('should replace backslashes with forward slashes', () => {
      expect(normalizePath('foo\\bar')).toBe('foo/bar');
    });

    it('should not alter paths with forward slashes', () => {
      expect(normalizePath('foo/bar')).toBe('foo/bar');
    });
  });

  describe('join', () => {
    it('should join paths and normalize', () => {
      expect(join('foo', 'bar', '..', 'baz')).toBe('foo/baz');
    });
  });

  describe('relative', () => {
    it('should return relative path with forward slashes', () => {
      expect(relative('/home/user/project', '/home/user/project/src/file.ts')).toBe(
        'src/file.ts',
      );
    });
  });

  describe('dirname', () => {
    it('should return directory name with forward slashes', () => {
      expect(dirname('/home/user/file.ts')).toBe('/home/user');
    });
  });

  describe('resolve', () => {
    it('should drop trailing slashes and dot segments', () => {
      expect(resolve('/etc/ssh/', './sshd_config')).toBe('/etc/ssh/sshd_config');
      expect(resolve('/etc/ssh/../hosts')).toBe('/etc/hosts');
    });
  });

  describe('isDescendantOrEqual', () => {
    it('matches the entry itself and anything below it', () => {
      expect(isDescendantOrEqual('/srv/app', '/srv/app')).toBe(true);
      expect(isDescendantOrEqual('/srv/app/config/db.yml', '/srv/app')).toBe(true);
    });

    it('does not match siblings sharing a name prefix', () => {
      expect(isDescendantOrEqual('/srv/application/main.js', '/srv/app')).toBe(false);
      expect(isDescendantOrEqual('/srv', '/srv/app')).toBe(false);
    });

    it('treats the filesystem root as an ancestor of everything', () => {
      expect(isDescendantOrEqual('/etc/passwd', '/')).toBe(true);
    });
  });

  describe('comparePaths', () => {
    it('orders by code unit rather than locale', () => {
      expect(['/b', '/a/z', '/B', '/a'].sort(comparePaths)).toEqual(['/B', '/a', '/a/z', '/b']);
    });
  });
});
