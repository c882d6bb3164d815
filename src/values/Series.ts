/**
 * Series helpers
 * 序列辅助函数
 */

import type { NumericSeries, Series, TextSeries } from './types';

/** Name given to the placeholder series 占位序列的名称 */
export const EMPTY_SERIES_NAME = 'empty';

/**
 * Create a numeric series
 * 创建数值序列
 */
export function createSeries(
  name: string,
  values: ReadonlyArray<number | null>,
  dtype: NumericSeries['dtype'] = 'float64'
): NumericSeries {
  return { name, dtype, values: [...values] };
}

export function createTextSeries(name: string, values: ReadonlyArray<string | null>): TextSeries {
  return { name, dtype: 'utf8', values: [...values] };
}

/**
 * Empty integer series used for unset inputs and missing columns
 * 用于未设置输入和缺失列的空整数序列
 */
export function emptySeries(name: string = EMPTY_SERIES_NAME): NumericSeries {
  return { name, dtype: 'int64', values: [] };
}

export function isNumericSeries(series: Series): series is NumericSeries {
  return series.dtype !== 'utf8';
}

export function seriesLength(series: Series): number {
  return series.values.length;
}

/**
 * Keep the entries e with min <= e <= max. Nulls and NaN never pass.
 * 保留满足 min <= e <= max 的项。null和NaN永不通过。
 */
export function filterInRange(series: NumericSeries, min: number, max: number): NumericSeries {
  const kept: number[] = [];
  for (const entry of series.values) {
    if (entry !== null && entry >= min && entry <= max) {
      kept.push(entry);
    }
  }
  return { name: series.name, dtype: series.dtype, values: kept };
}
