/**
 * Graph document type definitions
 * 图文档类型定义
 */

import type { DataType, Value } from '../values';
import type { InputParamKind, NodeKind } from '../templates';
import type { InputId, NodeId, OutputId } from '../graph/types';

/** Current document format version 当前文档格式版本 */
export const GRAPH_DOCUMENT_VERSION = 1;

/**
 * Serialization format
 * 序列化格式
 */
export enum GraphFormat {
  /** Human-readable JSON 便于阅读的JSON */
  JSON = 'json',
  /** MessagePack binary MessagePack二进制 */
  Binary = 'binary'
}

export interface InputPortRecord {
  id: InputId;
  name: string;
  type: DataType;
  kind: InputParamKind;
  shownInline: boolean;
  value: Value;
}

export interface OutputPortRecord {
  id: OutputId;
  name: string;
  type: DataType;
}

export interface NodeRecord {
  id: NodeId;
  kind: NodeKind;
  label: string;
  inputs: InputPortRecord[];
  outputs: OutputPortRecord[];
}

/**
 * JSON-safe snapshot of a graph
 * 图的JSON安全快照
 */
export interface GraphDocument {
  version: number;
  name: string;
  /** Next id sequence number 下一个ID序号 */
  nextId: number;
  nodes: NodeRecord[];
  /** Connections as [output, input] pairs 以[输出, 输入]对表示的连接 */
  connections: Array<[OutputId, InputId]>;
  /** Node shown by the inspector 检查器显示的节点 */
  activeNode: NodeId | null;
}

/**
 * Serialization options
 * 序列化选项
 */
export interface GraphSerializeOptions {
  format?: GraphFormat;
  /** Indent JSON output 缩进JSON输出 */
  prettyPrint?: boolean;
}
