/**
 * Evaluation engine
 * 求值引擎
 *
 * Top-level entry point for presentation code. Every request gets a fresh
 * OutputCache and failures come back as result objects instead of throws.
 * The engine adds statistics, an error handler hook and a debug history.
 * 面向展示代码的顶层入口。每次请求都会获得新的OutputCache，失败以结果对象返回而不是抛出。
 * 引擎还提供统计、错误处理钩子和调试历史。
 */

import type { Value } from '../values';
import type { GraphView, NodeId } from '../graph/types';
import { OutputCache } from './OutputCache';
import type { EvaluatorOptions } from './config';
import { evaluateNode } from './NodeEvaluator';

/**
 * Result of one evaluation request
 * 一次求值请求的结果
 */
export type EvaluationResult =
  | {
      success: true;
      /** Requested node 请求的节点 */
      nodeId: NodeId;
      value: Value;
      /** Outputs computed during the request 请求期间计算的输出 */
      cache: OutputCache;
      /** Execution time in milliseconds 执行时间（毫秒） */
      executionTime: number;
    }
  | {
      success: false;
      nodeId: NodeId;
      /** First failure in the dependency chain, unmodified 依赖链中的首个失败，未经修改 */
      error: Error;
      executionTime: number;
    };

/**
 * Evaluate a node with a fresh cache
 * 使用新缓存对节点求值
 */
export function evaluate(
  graph: GraphView,
  nodeId: NodeId,
  options: Partial<EvaluatorOptions> = {}
): EvaluationResult {
  const startTime = performance.now();
  const cache = new OutputCache();

  try {
    const value = evaluateNode(graph, nodeId, cache, options);
    return { success: true, nodeId, value, cache, executionTime: performance.now() - startTime };
  } catch (error) {
    return {
      success: false,
      nodeId,
      error: error instanceof Error ? error : new Error(String(error)),
      executionTime: performance.now() - startTime
    };
  }
}

/**
 * Evaluation engine configuration options
 * 求值引擎配置选项
 */
export interface EvaluationEngineOptions {
  /** Called for every failed request 每个失败的请求都会调用 */
  errorHandler?: (error: Error, nodeId: NodeId) => void;
  /** Record history and log requests 记录历史并输出请求日志 */
  debugMode?: boolean;
  /** Maximum history size 最大历史大小 */
  maxHistorySize?: number;
  /** Options for every request 每个请求的选项 */
  evaluator?: Partial<EvaluatorOptions>;
}

/**
 * Evaluation statistics
 * 求值统计
 */
export interface EvaluationStats {
  totalEvaluations: number;
  totalExecutionTime: number;
  averageExecutionTime: number;
  errors: number;
  lastExecutionTime: number;
}

/**
 * Evaluation record for debugging
 * 调试用的求值记录
 */
export interface EvaluationRecord {
  timestamp: number;
  nodeId: NodeId;
  executionTime: number;
  success: boolean;
  /** Error message if failed 失败时的错误信息 */
  error?: string;
  /** Number of outputs computed 计算的输出数量 */
  cachedOutputs: number;
}

const EMPTY_STATS: EvaluationStats = {
  totalEvaluations: 0,
  totalExecutionTime: 0,
  averageExecutionTime: 0,
  errors: 0,
  lastExecutionTime: 0
};

/**
 * Engine wrapping evaluate() with statistics and history
 * 用统计和历史包装evaluate()的引擎
 */
export class EvaluationEngine {
  private stats: EvaluationStats = { ...EMPTY_STATS };

  private errorHandler?: (error: Error, nodeId: NodeId) => void;

  private debugMode: boolean;

  private history: EvaluationRecord[] = [];

  private readonly maxHistorySize: number;

  private readonly evaluatorOptions: Partial<EvaluatorOptions>;

  constructor(options: EvaluationEngineOptions = {}) {
    this.errorHandler = options.errorHandler;
    this.debugMode = options.debugMode ?? false;
    this.maxHistorySize = Math.max(0, options.maxHistorySize ?? 100);
    this.evaluatorOptions = options.evaluator ?? {};
  }

  /**
   * Evaluate one node
   * 对一个节点求值
   */
  evaluate(graph: GraphView, nodeId: NodeId): EvaluationResult {
    const result = evaluate(graph, nodeId, {
      ...this.evaluatorOptions,
      debug: this.evaluatorOptions.debug ?? this.debugMode
    });

    this.updateStats(result.executionTime, !result.success);

    if (!result.success) {
      if (this.debugMode) {
        console.debug(`[EvaluationEngine] ${nodeId} failed: ${result.error.message}`);
      }
      this.errorHandler?.(result.error, nodeId);
    }

    if (this.debugMode) {
      this.record(result);
    }

    return result;
  }

  /**
   * Evaluate several nodes, each with its own cache
   * 对多个节点求值，每个节点使用自己的缓存
   */
  evaluateAll(graph: GraphView, nodeIds: readonly NodeId[]): Map<NodeId, EvaluationResult> {
    const results = new Map<NodeId, EvaluationResult>();
    for (const nodeId of nodeIds) {
      results.set(nodeId, this.evaluate(graph, nodeId));
    }
    return results;
  }

  getStats(): EvaluationStats {
    return { ...this.stats };
  }

  /**
   * Debug history, most recent first
   * 调试历史，最近的在前
   */
  getHistory(limit?: number): EvaluationRecord[] {
    const history = [...this.history].reverse();
    return limit !== undefined ? history.slice(0, limit) : history;
  }

  clearHistory(): void {
    this.history = [];
  }

  resetStats(): void {
    this.stats = { ...EMPTY_STATS };
  }

  setErrorHandler(handler: (error: Error, nodeId: NodeId) => void): void {
    this.errorHandler = handler;
  }

  /**
   * Enable or disable debug mode; disabling clears the history
   * 启用或禁用调试模式；禁用时清除历史
   */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
    if (!enabled) {
      this.clearHistory();
    }
  }

  private updateStats(executionTime: number, isError: boolean): void {
    this.stats.totalEvaluations++;
    this.stats.totalExecutionTime += executionTime;
    this.stats.lastExecutionTime = executionTime;
    if (isError) {
      this.stats.errors++;
    }
    this.stats.averageExecutionTime = this.stats.totalExecutionTime / this.stats.totalEvaluations;
  }

  private record(result: EvaluationResult): void {
    const record: EvaluationRecord = {
      timestamp: Date.now(),
      nodeId: result.nodeId,
      executionTime: result.executionTime,
      success: result.success,
      cachedOutputs: result.success ? result.cache.size : 0
    };
    if (!result.success) {
      record.error = result.error.message;
    }

    this.history.push(record);
    if (this.history.length > this.maxHistorySize) {
      this.history.splice(0, this.history.length - this.maxHistorySize);
    }
  }
}
