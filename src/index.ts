/**
 * Nodeframe - dependency-driven evaluator for dataflow node graphs
 * 数据流节点图的依赖驱动求值器
 *
 * @packageDocumentation
 */

// Errors
export * from './errors';

// Value model
export * from './values';

// Node templates
export * from './templates';

// Graph model
export * from './graph';

// CSV loading
export * from './io';

// Evaluation
export * from './evaluation';

// Inspector
export * from './inspector';

// Graph documents
export * from './serialization';
