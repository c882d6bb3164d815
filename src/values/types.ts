/**
 * Runtime value type definitions
 * 运行时值类型定义
 */

/**
 * Data type tags carried by ports and values
 * 端口和值携带的数据类型标签
 */
export type DataType =
  | 'scalar'   // Double precision number 双精度数
  | 'vector2'  // 2D vector 二维向量
  | 'text'     // String value 字符串值
  | 'series'   // Single named column 单个命名列
  | 'frame';   // Table of columns 列组成的表

/**
 * All data type tags in declaration order
 * 按声明顺序排列的所有数据类型标签
 */
export const DATA_TYPES: readonly DataType[] = ['scalar', 'vector2', 'text', 'series', 'frame'];

/**
 * 2D vector
 * 二维向量
 */
export interface Vec2 {
  x: number;
  y: number;
}

/**
 * Element type of a series
 * 序列的元素类型
 */
export type SeriesDType = 'float64' | 'int64' | 'utf8';

/**
 * Numeric column; null marks a missing entry
 * 数值列；null表示缺失项
 */
export interface NumericSeries {
  readonly name: string;
  readonly dtype: 'float64' | 'int64';
  readonly values: ReadonlyArray<number | null>;
}

/**
 * Text column, produced when a loaded column is not numeric
 * 文本列，当加载的列不是数值时产生
 */
export interface TextSeries {
  readonly name: string;
  readonly dtype: 'utf8';
  readonly values: ReadonlyArray<string | null>;
}

export type Series = NumericSeries | TextSeries;

/**
 * Table of named, equal-length columns with unique names
 * 名称唯一且长度相等的命名列组成的表
 */
export interface Frame {
  readonly columns: ReadonlyArray<Series>;
}

/**
 * Tagged runtime value
 * 带标签的运行时值
 */
export type Value =
  | { readonly type: 'scalar'; readonly value: number }
  | { readonly type: 'vector2'; readonly value: Vec2 }
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'series'; readonly value: Series }
  | { readonly type: 'frame'; readonly value: Frame };

/**
 * Payload type carried by a value of the given tag
 * 给定标签的值所携带的负载类型
 */
export type ValueOf<T extends DataType> = Extract<Value, { type: T }>['value'];
