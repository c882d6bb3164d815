/**
 * Evaluation error classes
 * 求值错误类
 *
 * Every failure raised while evaluating a node graph is an EvaluationError.
 * The `code` property discriminates the failure kind so callers can branch
 * without instanceof checks across module boundaries.
 * 节点图求值期间抛出的所有失败都是EvaluationError。
 * `code`属性用于区分失败类型。
 */

/**
 * Evaluation error codes
 * 求值错误码
 */
export type EvaluationErrorCode =
  | 'TypeMismatch'
  | 'UnknownPort'
  | 'UnknownNode'
  | 'FileReadFailure'
  | 'ParseFailure'
  | 'CacheInvariantViolated'
  | 'CycleDetected'
  | 'EvaluationDepthExceeded';

/**
 * Base class for evaluation failures
 * 求值失败的基类
 */
export abstract class EvaluationError extends Error {
  abstract readonly code: EvaluationErrorCode;
}

/**
 * A downcast was requested against a value of a different tag.
 * 对不同标签的值请求了向下转换。
 */
export class TypeMismatchError extends EvaluationError {
  readonly code = 'TypeMismatch';

  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Invalid cast from ${actual} to ${expected}`);
    this.name = 'TypeMismatchError';
  }
}

/**
 * Named input/output port does not exist on the node.
 * 节点上不存在指定名称的输入/输出端口。
 */
export class UnknownPortError extends EvaluationError {
  readonly code = 'UnknownPort';

  constructor(
    public readonly nodeId: string,
    public readonly portName: string,
    public readonly role: 'input' | 'output'
  ) {
    super(`Node '${nodeId}' has no ${role} port named '${portName}'`);
    this.name = 'UnknownPortError';
  }
}

export class UnknownNodeError extends EvaluationError {
  readonly code = 'UnknownNode';

  constructor(public readonly nodeId: string) {
    super(`Node '${nodeId}' does not exist in the graph`);
    this.name = 'UnknownNodeError';
  }
}

/**
 * A file could not be read.
 * 无法读取文件。
 */
export class FileReadError extends EvaluationError {
  readonly code = 'FileReadFailure';

  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Failed to read '${path}': ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'FileReadError';
  }
}

/**
 * Delimited text could not be parsed into a frame.
 * 分隔文本无法解析为数据表。
 */
export class ParseError extends EvaluationError {
  readonly code = 'ParseFailure';

  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(line !== undefined ? `${message} (line ${line})` : message);
    this.name = 'ParseError';
  }
}

/**
 * Internal contract failure: an output is missing from the cache right after
 * its node was evaluated.
 * 内部契约失败：节点求值后其输出仍不在缓存中。
 */
export class CacheInvariantError extends EvaluationError {
  readonly code = 'CacheInvariantViolated';

  constructor(
    public readonly nodeId: string,
    public readonly outputId: string
  ) {
    super(`Output '${outputId}' of node '${nodeId}' was not cached after evaluation`);
    this.name = 'CacheInvariantError';
  }
}

export class CycleDetectedError extends EvaluationError {
  readonly code = 'CycleDetected';

  constructor(public readonly path: readonly string[]) {
    super(`Dependency cycle detected: ${path.join(' -> ')}`);
    this.name = 'CycleDetectedError';
  }
}

export class EvaluationDepthError extends EvaluationError {
  readonly code = 'EvaluationDepthExceeded';

  constructor(
    public readonly nodeId: string,
    public readonly maxDepth: number
  ) {
    super(`Evaluation of node '${nodeId}' exceeded the maximum dependency depth of ${maxDepth}`);
    this.name = 'EvaluationDepthError';
  }
}

/**
 * Type guard for evaluation errors
 * 求值错误的类型守卫
 */
export function isEvaluationError(error: unknown): error is EvaluationError {
  return error instanceof EvaluationError;
}
