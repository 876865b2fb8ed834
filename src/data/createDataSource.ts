import type { ColumnInfo, DataSource, DataSourceEventName, DataSourceListener } from './DataSource';
import { InvalidDataError, InvalidDimensionError } from '../core/errors';

export interface MemoryDataSource extends DataSource {
  /** Appends one row and emits `new-data-point`. */
  addPoint(row: ReadonlyArray<number>): void;
  /**
   * Appends rows as a new block and emits `new-data-block` once.
   * All rows are checked before any is stored; an empty block is a no-op.
   */
  addBlock(rows: ReadonlyArray<ReadonlyArray<number>>): void;
  getBlockCount(): number;
  getRows(): ReadonlyArray<ReadonlyArray<number>>;
}

export interface DataSourceInit {
  readonly name?: string;
  readonly columns: ReadonlyArray<ColumnInfo>;
  /** Rows already acquired, grouped in blocks. Stored without emitting events. */
  readonly blocks?: ReadonlyArray<ReadonlyArray<ReadonlyArray<number>>>;
}

type ListenerRegistry = Readonly<Record<DataSourceEventName, Set<DataSourceListener>>>;

export const formatColumnLabel = (column: ColumnInfo): string =>
  column.units !== undefined && column.units.length > 0 ? `${column.name} (${column.units})` : column.name;

const assertColumnOrder = (columns: ReadonlyArray<ColumnInfo>): void => {
  let seenValue = false;
  for (let i = 0; i < columns.length; i++) {
    if (columns[i].type === 'value') {
      seenValue = true;
    } else if (seenValue) {
      throw new InvalidDataError(
        `createDataSource: coordinate column ${i} ('${columns[i].name}') follows a value column. Coordinates must come first.`
      );
    }
  }
};

export function createDataSource(init: DataSourceInit): MemoryDataSource {
  const columns = init.columns.slice();
  assertColumnOrder(columns);

  const name = init.name ?? '';
  const coordinateCount = columns.filter((c) => c.type === 'coordinate').length;
  const valueCount = columns.length - coordinateCount;

  const rows: number[][] = [];
  // Index of the first row of each block.
  const blockStarts: number[] = [];

  const listeners: ListenerRegistry = {
    'new-data-point': new Set<DataSourceListener>(),
    'new-data-block': new Set<DataSourceListener>(),
  };

  const checkRow = (row: ReadonlyArray<number>, context: string): void => {
    if (row.length !== columns.length) {
      throw new InvalidDataError(
        `${context}: row has ${row.length} values, expected ${columns.length}.`
      );
    }
  };

  const checkColumn = (column: number, context: string): void => {
    if (!Number.isInteger(column) || column < 0 || column >= columns.length) {
      throw new InvalidDimensionError(context, column, columns.length);
    }
  };

  const storeBlock = (block: ReadonlyArray<ReadonlyArray<number>>): void => {
    blockStarts.push(rows.length);
    for (const row of block) rows.push(row.slice());
  };

  for (const block of init.blocks ?? []) {
    if (block.length === 0) continue;
    for (const row of block) checkRow(row, 'createDataSource');
    storeBlock(block);
  }

  // Listeners may remove themselves while being notified.
  const emit = (eventName: DataSourceEventName): void => {
    for (const listener of Array.from(listeners[eventName])) listener(source);
  };

  const source: MemoryDataSource = {
    name,
    getCoordinateCount: () => coordinateCount,
    getValueCount: () => valueCount,
    getColumns: () => columns,
    formatLabel(column) {
      checkColumn(column, `DataSource(${name}).formatLabel`);
      return formatColumnLabel(columns[column]);
    },
    getColumn(column) {
      checkColumn(column, `DataSource(${name}).getColumn`);
      return rows.map((row) => row[column]);
    },
    getPointCount: () => rows.length,
    getBlockCount: () => blockStarts.length,
    getRows: () => rows,
    addPoint(row) {
      checkRow(row, `DataSource(${name}).addPoint`);
      if (blockStarts.length === 0) blockStarts.push(0);
      rows.push(row.slice());
      emit('new-data-point');
    },
    addBlock(block) {
      if (block.length === 0) return;
      for (const row of block) checkRow(row, `DataSource(${name}).addBlock`);
      storeBlock(block);
      emit('new-data-block');
    },
    on(eventName, listener) {
      listeners[eventName].add(listener);
    },
    off(eventName, listener) {
      listeners[eventName].delete(listener);
    },
  };

  return source;
}
