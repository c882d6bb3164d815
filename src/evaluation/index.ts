/**
 * Graph evaluation
 * 图求值
 */

export * from './OutputCache';
export * from './operations';
export * from './config';
export * from './NodeEvaluator';
export * from './EvaluationEngine';
