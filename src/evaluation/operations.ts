/**
 * Node operation table
 * 节点操作表
 *
 * One operation per node kind. Operations pull their inputs lazily through
 * OperationInputs, which resolves (and if needed evaluates) upstream nodes,
 * and return a value for each output they produce.
 * 每种节点类型对应一个操作。操作通过OperationInputs惰性获取输入
 * （必要时对上游节点求值），并为其产生的每个输出返回一个值。
 */

import type { NodeKind } from '../templates';
import type { Frame, Series, Value, Vec2 } from '../values';
import {
  scalar,
  vector2,
  seriesValue,
  frameValue,
  frameHeight,
  getColumn,
  emptySeries,
  filterInRange,
  isNumericSeries
} from '../values';
import { TypeMismatchError } from '../errors';
import type { CsvOptions } from '../io';

/**
 * Typed access to a node's resolved inputs
 * 对节点已解析输入的类型化访问
 */
export interface OperationInputs {
  value(name: string): Value;
  scalar(name: string): number;
  vector2(name: string): Vec2;
  text(name: string): string;
  series(name: string): Series;
  frame(name: string): Frame;
}

/**
 * Services available to operations
 * 操作可用的服务
 */
export interface OperationEnvironment {
  csv: CsvOptions;
  readCsv(path: string, options: CsvOptions): Frame;
}

/**
 * Values keyed by output name
 * 以输出名称为键的值
 */
export type OperationOutputs = Readonly<Record<string, Value | undefined>>;

export type NodeOperation = (inputs: OperationInputs, env: OperationEnvironment) => OperationOutputs;

export type OperationTable = { readonly [K in NodeKind]: NodeOperation };

export const NODE_OPERATIONS: OperationTable = {
  MakeScalar: inputs => ({ out: scalar(inputs.scalar('value')) }),

  AddScalar: inputs => {
    const a = inputs.scalar('A');
    const b = inputs.scalar('B');
    return { out: scalar(a + b) };
  },

  SubtractScalar: inputs => {
    const a = inputs.scalar('A');
    const b = inputs.scalar('B');
    return { out: scalar(a - b) };
  },

  MakeVector: inputs => {
    const x = inputs.scalar('x');
    const y = inputs.scalar('y');
    return { out: vector2(x, y) };
  },

  AddVector: inputs => {
    const v1 = inputs.vector2('v1');
    const v2 = inputs.vector2('v2');
    return { out: vector2(v1.x + v2.x, v1.y + v2.y) };
  },

  SubtractVector: inputs => {
    const v1 = inputs.vector2('v1');
    const v2 = inputs.vector2('v2');
    return { out: vector2(v1.x - v2.x, v1.y - v2.y) };
  },

  VectorTimesScalar: inputs => {
    const factor = inputs.scalar('scalar');
    const vector = inputs.vector2('vector');
    return { out: vector2(vector.x * factor, vector.y * factor) };
  },

  LoadCSV: (inputs, env) => {
    const path = inputs.text('path');
    return { out: frameValue(env.readCsv(path, env.csv)) };
  },

  CountRows: inputs => ({ out: scalar(frameHeight(inputs.frame('df'))) }),

  // A missing column yields the empty placeholder series, not an error
  // 缺失的列产生空占位序列，而不是错误
  SelectColumn: inputs => {
    const frame = inputs.frame('df');
    const column = inputs.text('column');
    return { out: seriesValue(getColumn(frame, column) ?? emptySeries()) };
  },

  SimpleFilter: inputs => {
    const series = inputs.series('df');
    const min = inputs.scalar('min');
    const max = inputs.scalar('max');
    if (!isNumericSeries(series)) {
      throw new TypeMismatchError('numeric series', `${series.dtype} series`);
    }
    return { out: seriesValue(filterInRange(series, min, max)) };
  }
};
