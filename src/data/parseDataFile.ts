/**
 * Parser for the tab-separated `.dat` files written by the acquisition software.
 *
 * Layout:
 *
 * ```text
 * # Filename: sweep.dat
 * # Timestamp: Tue Mar  3 14:02:11 2026
 *
 * # Column 1:
 * #	name: Gate voltage
 * #	units: V
 * #	type: coordinate
 * # Column 2:
 * #	name: Current
 * #	units: nA
 * #	type: value
 *
 * 0.0	1.25
 * 0.1	1.31
 *
 * 0.0	1.27
 * ```
 *
 * Blank lines between data rows start a new block (e.g. the next sweep of an
 * outer coordinate). Header keys other than `name`, `units` and `type` are
 * ignored.
 */

import type { ColumnInfo, ColumnType } from './DataSource';
import { createDataSource } from './createDataSource';
import type { MemoryDataSource } from './createDataSource';
import { InvalidDataError } from '../core/errors';

export interface ParseDataFileOptions {
  /** Source name; defaults to the `Filename` header, then to `''`. */
  readonly name?: string;
}

export interface ParsedDataFile {
  readonly filename: string | undefined;
  readonly columns: ReadonlyArray<ColumnInfo>;
  readonly blocks: ReadonlyArray<ReadonlyArray<ReadonlyArray<number>>>;
}

type MutableColumn = { name: string | undefined; units: string | undefined; type: ColumnType };

const COLUMN_HEADER_RE = /^#\s*Column\s+(\d+)\s*:\s*$/i;
const COLUMN_PROPERTY_RE = /^#\s+(\w+)\s*:\s*(.*)$/;
const FILENAME_RE = /^#\s*Filename\s*:\s*(.*)$/i;

const parseColumnType = (raw: string, lineNumber: number): ColumnType => {
  const type = raw.trim().toLowerCase();
  if (type === 'coordinate' || type === 'value') return type;
  throw new InvalidDataError(`parseDataFile: line ${lineNumber}: unknown column type '${raw.trim()}'.`);
};

const parseRow = (line: string, lineNumber: number): number[] => {
  const fields = line.trim().split(/\s+/);
  return fields.map((field) => {
    const value = Number(field);
    if (Number.isNaN(value) && field.toLowerCase() !== 'nan') {
      throw new InvalidDataError(`parseDataFile: line ${lineNumber}: '${field}' is not a number.`);
    }
    return value;
  });
};

/**
 * Parses the text of a `.dat` file into column metadata and blocks of rows.
 *
 * @throws {InvalidDataError} On malformed numbers, ragged rows, unknown column
 * types or coordinate columns declared after value columns.
 */
export function parseDataFileContent(text: string): ParsedDataFile {
  const lines = text.split(/\r?\n/);

  let filename: string | undefined;
  const declared: MutableColumn[] = [];
  let current: MutableColumn | null = null;

  const blocks: number[][][] = [];
  let block: number[][] = [];
  let rowWidth: number | null = null;

  const closeBlock = (): void => {
    if (block.length > 0) blocks.push(block);
    block = [];
  };

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i];

    if (line.startsWith('#')) {
      const filenameMatch = FILENAME_RE.exec(line);
      if (filenameMatch) {
        filename = filenameMatch[1].trim();
        continue;
      }

      const headerMatch = COLUMN_HEADER_RE.exec(line);
      if (headerMatch) {
        current = { name: undefined, units: undefined, type: 'value' };
        declared.push(current);
        continue;
      }

      const propertyMatch = COLUMN_PROPERTY_RE.exec(line);
      if (propertyMatch && current) {
        const key = propertyMatch[1].toLowerCase();
        const value = propertyMatch[2].trim();
        if (key === 'name') current.name = value;
        else if (key === 'units') current.units = value;
        else if (key === 'type') current.type = parseColumnType(value, lineNumber);
        continue;
      }

      // Any other comment line ends the current column description.
      current = null;
      continue;
    }

    if (line.trim().length === 0) {
      closeBlock();
      continue;
    }

    const row = parseRow(line, lineNumber);
    if (rowWidth === null) {
      rowWidth = row.length;
    } else if (row.length !== rowWidth) {
      throw new InvalidDataError(
        `parseDataFile: line ${lineNumber}: row has ${row.length} values, expected ${rowWidth}.`
      );
    }
    block.push(row);
  }
  closeBlock();

  const columns: ColumnInfo[] =
    declared.length > 0
      ? declared.map((c, index) => ({
          name: c.name ?? `col${index}`,
          type: c.type,
          ...(c.units !== undefined ? { units: c.units } : {}),
        }))
      : Array.from({ length: rowWidth ?? 0 }, (_, index): ColumnInfo => ({ name: `col${index}`, type: 'value' }));

  if (rowWidth !== null && rowWidth !== columns.length) {
    throw new InvalidDataError(
      `parseDataFile: header declares ${columns.length} columns but rows have ${rowWidth} values.`
    );
  }

  return { filename, columns, blocks };
}

/**
 * Parses `.dat` text straight into a data source.
 */
export function parseDataFile(text: string, options: ParseDataFileOptions = {}): MemoryDataSource {
  const parsed = parseDataFileContent(text);
  return createDataSource({
    name: options.name ?? parsed.filename ?? '',
    columns: parsed.columns,
    blocks: parsed.blocks,
  });
}
