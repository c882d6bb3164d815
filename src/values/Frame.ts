/**
 * Frame helpers
 * 数据表辅助函数
 */

import type { Frame, Series } from './types';

/**
 * Create a frame, validating unique names and equal column lengths
 * 创建数据表，并验证列名唯一且列长度相等
 *
 * @throws Error when a name repeats or lengths differ 当列名重复或长度不一致时抛出
 */
export function createFrame(columns: ReadonlyArray<Series>): Frame {
  const names = new Set<string>();
  const height = columns.length > 0 ? columns[0].values.length : 0;

  for (const column of columns) {
    if (names.has(column.name)) {
      throw new Error(`Duplicate column name '${column.name}' in frame`);
    }
    names.add(column.name);

    if (column.values.length !== height) {
      throw new Error(
        `Column '${column.name}' has ${column.values.length} rows, expected ${height}`
      );
    }
  }

  return { columns: [...columns] };
}

export function emptyFrame(): Frame {
  return { columns: [] };
}

/**
 * Number of rows; a frame without columns has none
 * 行数；没有列的数据表行数为0
 */
export function frameHeight(frame: Frame): number {
  return frame.columns.length > 0 ? frame.columns[0].values.length : 0;
}

export function frameWidth(frame: Frame): number {
  return frame.columns.length;
}

export function columnNames(frame: Frame): string[] {
  return frame.columns.map(column => column.name);
}

export function getColumn(frame: Frame, name: string): Series | undefined {
  return frame.columns.find(column => column.name === name);
}
