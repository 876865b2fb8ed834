import { InvalidDimensionError } from '../core/errors';
import { getColumnCount } from '../data/DataSource';
import type { DataSource } from '../data/DataSource';

/**
 * Checks an explicitly requested column index against the source's current
 * schema and returns it.
 */
export function assertColumn(source: DataSource, column: number, context: string): number {
  const columnCount = getColumnCount(source);
  if (!Number.isInteger(column) || column < 0 || column >= columnCount) {
    throw new InvalidDimensionError(context, column, columnCount);
  }
  return column;
}
