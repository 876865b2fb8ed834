export type DataSourceEventName = 'new-data-point' | 'new-data-block';

export type DataSourceListener = (source: DataSource) => void;

export type ColumnType = 'coordinate' | 'value';

export interface ColumnInfo {
  readonly name: string;
  readonly units?: string;
  readonly type: ColumnType;
}

/**
 * Column-structured stream of numeric samples.
 *
 * Columns are ordered coordinates first, then values; a column index counts
 * across both. Sources are shared: several plots may subscribe to the same one.
 */
export interface DataSource {
  readonly name: string;
  getCoordinateCount(): number;
  getValueCount(): number;
  getColumns(): ReadonlyArray<ColumnInfo>;
  /** Axis label text for a column. Throws `InvalidDimensionError` when out of range. */
  formatLabel(column: number): string;
  getColumn(column: number): number[];
  getPointCount(): number;
  on(eventName: DataSourceEventName, listener: DataSourceListener): void;
  off(eventName: DataSourceEventName, listener: DataSourceListener): void;
}

export const getColumnCount = (source: DataSource): number =>
  source.getCoordinateCount() + source.getValueCount();
