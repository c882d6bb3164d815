import { describe, test, expect } from 'vitest';
import {
  createSeries,
  createTextSeries,
  emptySeries,
  filterInRange,
  isNumericSeries,
  seriesLength,
  createFrame,
  emptyFrame,
  frameHeight,
  frameWidth,
  columnNames,
  getColumn
} from '../../src/values';

describe('Series', () => {
  test('should keep entries inside the inclusive range and drop nulls', () => {
    const series = createSeries('x', [0, 1, 2, 3, 4, null], 'int64');
    const filtered = filterInRange(series, 1, 3);

    expect(filtered).toEqual({ name: 'x', dtype: 'int64', values: [1, 2, 3] });
    expect(series.values).toEqual([0, 1, 2, 3, 4, null]);
  });

  test('should drop NaN entries', () => {
    const filtered = filterInRange(createSeries('y', [NaN, 0.5, 2.5]), 0, 1);
    expect(filtered.values).toEqual([0.5]);
    expect(filtered.dtype).toBe('float64');
  });

  test('should return an empty series when min exceeds max', () => {
    expect(filterInRange(createSeries('z', [1, 2, 3]), 3, 1).values).toEqual([]);
  });

  test('should create the empty placeholder series', () => {
    expect(emptySeries()).toEqual({ name: 'empty', dtype: 'int64', values: [] });
    expect(seriesLength(emptySeries())).toBe(0);
  });

  test('should tell numeric and text series apart', () => {
    expect(isNumericSeries(createSeries('a', [1]))).toBe(true);
    expect(isNumericSeries(createTextSeries('b', ['1']))).toBe(false);
  });
});

describe('Frame', () => {
  test('should expose shape and columns', () => {
    const frame = createFrame([createSeries('a', [1, 2]), createTextSeries('b', ['x', null])]);

    expect(frameHeight(frame)).toBe(2);
    expect(frameWidth(frame)).toBe(2);
    expect(columnNames(frame)).toEqual(['a', 'b']);
    expect(getColumn(frame, 'b')?.values).toEqual(['x', null]);
    expect(getColumn(frame, 'c')).toBeUndefined();
  });

  test('should have no rows without columns', () => {
    expect(frameHeight(emptyFrame())).toBe(0);
    expect(frameWidth(emptyFrame())).toBe(0);
  });

  test('should reject duplicate column names', () => {
    expect(() => createFrame([createSeries('a', [1]), createSeries('a', [2])]))
      .toThrow("Duplicate column name 'a' in frame");
  });

  test('should reject columns of different lengths', () => {
    expect(() => createFrame([createSeries('a', [1, 2]), createSeries('b', [1])]))
      .toThrow("Column 'b' has 1 rows, expected 2");
  });
});
