import { describe, it, expect, vi } from 'vitest';
import { createDataSource, formatColumnLabel } from '../createDataSource';
import { getColumnCount } from '../DataSource';
import type { ColumnInfo } from '../DataSource';
import { InvalidDataError, InvalidDimensionError } from '../../core/errors';

const columns: ColumnInfo[] = [
  { name: 'Gate voltage', units: 'V', type: 'coordinate' },
  { name: 'Field', units: 'T', type: 'coordinate' },
  { name: 'Current', units: 'nA', type: 'value' },
];

describe('createDataSource - schema', () => {
  it('counts coordinate and value columns', () => {
    const source = createDataSource({ columns });
    expect(source.getCoordinateCount()).toBe(2);
    expect(source.getValueCount()).toBe(1);
    expect(getColumnCount(source)).toBe(3);
  });

  it('rejects coordinate columns after value columns', () => {
    expect(() =>
      createDataSource({
        columns: [
          { name: 'Current', type: 'value' },
          { name: 'Gate voltage', type: 'coordinate' },
        ],
      })
    ).toThrow(InvalidDataError);
  });

  it('formats labels with units in parentheses', () => {
    const source = createDataSource({ columns });
    expect(source.formatLabel(0)).toBe('Gate voltage (V)');
    expect(source.formatLabel(2)).toBe('Current (nA)');
    expect(formatColumnLabel({ name: 'Index', type: 'coordinate' })).toBe('Index');
    expect(formatColumnLabel({ name: 'Index', units: '', type: 'coordinate' })).toBe('Index');
  });

  it('throws InvalidDimensionError for labels of unknown columns', () => {
    const source = createDataSource({ name: 'sweep', columns });
    expect(() => source.formatLabel(3)).toThrow(InvalidDimensionError);
    expect(() => source.formatLabel(-1)).toThrow(
      'DataSource(sweep).formatLabel: column index -1 is out of range (source has 3 columns).'
    );
  });
});

describe('createDataSource - points and blocks', () => {
  it('stores initial blocks without emitting', () => {
    const source = createDataSource({
      columns,
      blocks: [
        [
          [0, 0, 1],
          [1, 0, 2],
        ],
        [],
        [[0, 1, 3]],
      ],
    });
    expect(source.getPointCount()).toBe(3);
    expect(source.getBlockCount()).toBe(2);
    expect(source.getColumn(2)).toEqual([1, 2, 3]);
  });

  it('emits new-data-point for every point', () => {
    const source = createDataSource({ columns });
    const onPoint = vi.fn();
    source.on('new-data-point', onPoint);

    source.addPoint([0, 0, 1.5]);
    source.addPoint([0.1, 0, 1.6]);

    expect(onPoint).toHaveBeenCalledTimes(2);
    expect(onPoint).toHaveBeenCalledWith(source);
    expect(source.getColumn(0)).toEqual([0, 0.1]);
    expect(source.getBlockCount()).toBe(1);
  });

  it('emits new-data-block once per block', () => {
    const source = createDataSource({ columns });
    const onPoint = vi.fn();
    const onBlock = vi.fn();
    source.on('new-data-point', onPoint);
    source.on('new-data-block', onBlock);

    source.addBlock([
      [0, 0, 1],
      [1, 0, 2],
    ]);
    source.addBlock([]);

    expect(onBlock).toHaveBeenCalledTimes(1);
    expect(onPoint).not.toHaveBeenCalled();
    expect(source.getPointCount()).toBe(2);
    expect(source.getBlockCount()).toBe(1);
  });

  it('rejects rows of the wrong width without storing any of the block', () => {
    const source = createDataSource({ name: 'sweep', columns });
    expect(() => source.addPoint([1, 2])).toThrow('DataSource(sweep).addPoint: row has 2 values, expected 3.');
    expect(() => source.addBlock([[0, 0, 1], [1, 0]])).toThrow(InvalidDataError);
    expect(source.getPointCount()).toBe(0);
  });

  it('copies rows so later caller mutation has no effect', () => {
    const source = createDataSource({ columns });
    const row = [0, 0, 1];
    source.addPoint(row);
    row[2] = 99;
    expect(source.getColumn(2)).toEqual([1]);
  });

  it('propagates listener errors to the caller', () => {
    const source = createDataSource({ columns });
    source.on('new-data-block', () => {
      throw new Error('listener failed');
    });
    expect(() => source.addBlock([[0, 0, 1]])).toThrow('listener failed');
  });

  it('stops notifying after off()', () => {
    const source = createDataSource({ columns });
    const onPoint = vi.fn();
    source.on('new-data-point', onPoint);
    source.off('new-data-point', onPoint);

    source.addPoint([0, 0, 1]);

    expect(onPoint).not.toHaveBeenCalled();
  });
});
