/**
 * Data type display information
 * 数据类型显示信息
 */

import type { DataType } from '../values';

export interface DataTypeInfo {
  /** Display name 显示名称 */
  name: string;
  /** Port colour as [r, g, b] 端口颜色 */
  color: readonly [number, number, number];
}

export const DATA_TYPE_INFO: { readonly [T in DataType]: DataTypeInfo } = {
  scalar: { name: 'scalar', color: [38, 109, 211] },
  vector2: { name: '2d vector', color: [238, 207, 109] },
  text: { name: 'string', color: [134, 51, 109] },
  series: { name: 'series', color: [31, 207, 180] },
  frame: { name: 'dataframe', color: [60, 100, 80] }
};

/**
 * Colour as a CSS hex string
 * CSS十六进制颜色字符串
 */
export function dataTypeColorHex(type: DataType): string {
  return '#' + DATA_TYPE_INFO[type].color
    .map(channel => channel.toString(16).padStart(2, '0'))
    .join('');
}
