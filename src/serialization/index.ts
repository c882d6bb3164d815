/**
 * Graph documents
 * 图文档
 */

export * from './types';
export * from './validate';
export * from './GraphSerializer';
