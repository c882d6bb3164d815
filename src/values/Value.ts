/**
 * Value constructors, accessors and formatting
 * 值的构造、访问与格式化
 *
 * Accessors never coerce: asking a scalar for a vector fails with a
 * TypeMismatchError instead of returning a default.
 * 访问器从不进行强制转换：向标量请求向量会以TypeMismatchError失败，而不是返回默认值。
 */

import { TypeMismatchError } from '../errors';
import type { DataType, Frame, Series, Value, ValueOf, Vec2 } from './types';
import { frameHeight, frameWidth, columnNames } from './Frame';

/** Series entries shown before eliding 省略前显示的序列项数 */
const MAX_FORMATTED_ENTRIES = 10;

export function scalar(value: number): Value {
  return { type: 'scalar', value };
}

export function vector2(x: number, y: number): Value {
  return { type: 'vector2', value: { x, y } };
}

export function text(value: string): Value {
  return { type: 'text', value };
}

export function seriesValue(series: Series): Value {
  return { type: 'series', value: series };
}

export function frameValue(frame: Frame): Value {
  return { type: 'frame', value: frame };
}

/**
 * Narrow to a scalar
 * 收窄为标量
 */
export function tryScalar(value: Value): number {
  if (value.type === 'scalar') return value.value;
  throw new TypeMismatchError('scalar', value.type);
}

/**
 * Narrow to a 2D vector
 * 收窄为二维向量
 */
export function tryVector2(value: Value): Vec2 {
  if (value.type === 'vector2') return value.value;
  throw new TypeMismatchError('vector2', value.type);
}

export function tryText(value: Value): string {
  if (value.type === 'text') return value.value;
  throw new TypeMismatchError('text', value.type);
}

export function trySeries(value: Value): Series {
  if (value.type === 'series') return value.value;
  throw new TypeMismatchError('series', value.type);
}

export function tryFrame(value: Value): Frame {
  if (value.type === 'frame') return value.value;
  throw new TypeMismatchError('frame', value.type);
}

const accessors: { [K in DataType]: (value: Value) => ValueOf<K> } = {
  scalar: tryScalar,
  vector2: tryVector2,
  text: tryText,
  series: trySeries,
  frame: tryFrame
};

/**
 * Generic fallible downcast
 * 通用的可失败向下转换
 *
 * @example
 * ```typescript
 * const v = valueAs(vector2(1, 2), 'vector2'); // { x: 1, y: 2 }
 * valueAs(scalar(1), 'text');                   // throws TypeMismatchError
 * ```
 */
export function valueAs<T extends DataType>(value: Value, type: T): ValueOf<T> {
  return accessors[type](value);
}

export function isValueOfType(value: Value, type: DataType): boolean {
  return value.type === type;
}

function formatEntry(entry: number | string | null): string {
  if (entry === null) return 'null';
  return typeof entry === 'string' ? JSON.stringify(entry) : String(entry);
}

function formatSeries(series: Series): string {
  const values: ReadonlyArray<number | string | null> = series.values;
  const shown = values.slice(0, MAX_FORMATTED_ENTRIES).map(formatEntry);
  if (values.length > MAX_FORMATTED_ENTRIES) {
    shown.push(`… (+${values.length - MAX_FORMATTED_ENTRIES} more)`);
  }
  return `Series ${JSON.stringify(series.name)} [${shown.join(', ')}]`;
}

/**
 * Single-line display form of a value
 * 值的单行显示形式
 */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'scalar':
      return `Scalar(${value.value})`;
    case 'vector2':
      return `Vector2(${value.value.x}, ${value.value.y})`;
    case 'text':
      return `Text(${JSON.stringify(value.value)})`;
    case 'series':
      return formatSeries(value.value);
    case 'frame':
      return `Frame ${frameHeight(value.value)}x${frameWidth(value.value)} [${columnNames(value.value).join(', ')}]`;
  }
}

export function isDataType(value: string): value is DataType {
  return value === 'scalar' || value === 'vector2' || value === 'text' || value === 'series' || value === 'frame';
}
