/**
 * Node templates
 * 节点模板
 */

export * from './NodeTemplates';
export * from './DataTypes';
