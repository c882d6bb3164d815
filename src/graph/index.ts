/**
 * Graph model
 * 图模型
 */

export * from './types';
export * from './NodeGraph';
