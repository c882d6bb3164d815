/**
 * Error types
 * 错误类型
 */

export * from './EvaluationError';
export * from './GraphErrors';
