import { readFileSync, statSync } from 'node:fs';
import { basename } from 'node:path';
import { parseDataFile } from './parseDataFile';
import type { MemoryDataSource } from './createDataSource';

/**
 * True when `path` names an existing regular file.
 */
export function isDataFile(path: string): boolean {
  if (path.length === 0) return false;
  const stats = statSync(path, { throwIfNoEntry: false });
  return stats !== undefined && stats.isFile();
}

/**
 * Reads and parses a `.dat` file. The source is named after the file.
 *
 * Synchronous: plots load their path arguments while being constructed.
 */
export function loadDataFile(path: string): MemoryDataSource {
  const text = readFileSync(path, 'utf8');
  return parseDataFile(text, { name: basename(path) });
}
