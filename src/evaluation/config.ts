/**
 * Evaluator configuration
 * 求值器配置
 */

import type { Frame } from '../values';
import type { CsvOptions } from '../io';
import { DEFAULT_CSV_OPTIONS, readCsvFile } from '../io';
import type { NodeKind } from '../templates';
import type { NodeOperation } from './operations';

/**
 * Evaluator options
 * 求值器选项
 */
export interface EvaluatorOptions {
  /** Fail with CycleDetectedError when a node depends on itself 节点依赖自身时以CycleDetectedError失败 */
  detectCycles: boolean;
  /**
   * Longest dependency chain followed before failing. Unbounded while cycles
   * are detected, UNCHECKED_MAX_DEPTH when detection is off.
   * 失败前允许的最长依赖链。检测循环时不限制，关闭检测时为UNCHECKED_MAX_DEPTH。
   */
  maxDepth: number;
  /** Options passed to the CSV reader 传递给CSV读取器的选项 */
  csv: CsvOptions;
  /** File boundary used by LoadCSV LoadCSV使用的文件边界 */
  readCsv: (path: string, options: CsvOptions) => Frame;
  /** Replacement operations per kind 按类型替换的操作 */
  operations: Partial<Record<NodeKind, NodeOperation>>;
  /** Log each evaluated node 记录每个已求值的节点 */
  debug: boolean;
}

/**
 * Depth limit that stops cycles when cycle detection is switched off
 * 关闭循环检测时用于终止循环的深度限制
 */
export const UNCHECKED_MAX_DEPTH = 512;

export const DEFAULT_EVALUATOR_OPTIONS: Readonly<EvaluatorOptions> = {
  detectCycles: true,
  maxDepth: Infinity,
  csv: DEFAULT_CSV_OPTIONS,
  readCsv: readCsvFile,
  operations: {},
  debug: false
};

/**
 * Merge partial options over the defaults
 * 将部分选项合并到默认值之上
 *
 * @throws RangeError when maxDepth is not a positive integer or Infinity maxDepth不是正整数或Infinity时抛出
 */
export function resolveEvaluatorOptions(options: Partial<EvaluatorOptions> = {}): EvaluatorOptions {
  const detectCycles = options.detectCycles ?? DEFAULT_EVALUATOR_OPTIONS.detectCycles;
  const maxDepth = options.maxDepth ?? (detectCycles ? DEFAULT_EVALUATOR_OPTIONS.maxDepth : UNCHECKED_MAX_DEPTH);
  if (maxDepth !== Infinity && (!Number.isInteger(maxDepth) || maxDepth < 1)) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }

  return {
    detectCycles,
    maxDepth,
    csv: { ...DEFAULT_EVALUATOR_OPTIONS.csv, ...options.csv },
    readCsv: options.readCsv ?? DEFAULT_EVALUATOR_OPTIONS.readCsv,
    operations: { ...options.operations },
    debug: options.debug ?? DEFAULT_EVALUATOR_OPTIONS.debug
  };
}
