/**
 * Value model
 * 值模型
 */

export * from './types';
export * from './Value';
export * from './Series';
export * from './Frame';
