import { describe, it, expect } from 'vitest';
import { name, lockPathFor } from './index';

describe('store package', () => {
  it('exports name', () => {
    expect(name).toBe('@filewarden/store');
  });

  it('places the lock file beside the database', () => {
    expect(lockPathFor('/var/lib/filewarden/baseline.db')).toBe('/var/lib/filewarden/baseline.db.lock');
  });
});
