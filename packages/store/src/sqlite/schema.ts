export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS baseline_meta (
  schema_version INTEGER NOT NULL,
  algorithm TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  file_count INTEGER NOT NULL,
  failed_count INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS baseline_files (
  path TEXT PRIMARY KEY NOT NULL,
  size INTEGER NOT NULL,
  mtime_ms REAL NOT NULL,
  mode INTEGER NOT NULL,
  digest TEXT NOT NULL,
  algorithm TEXT NOT NULL
);
`;

export const INSERT_META_SQL =
  'INSERT INTO baseline_meta (schema_version, algorithm, created_at, file_count, failed_count) VALUES (?, ?, ?, ?, ?)';

export const INSERT_FILE_SQL =
  'INSERT INTO baseline_files (path, size, mtime_ms, mode, digest, algorithm) VALUES (?, ?, ?, ?, ?, ?)';
