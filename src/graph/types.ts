/**
 * Graph model type definitions
 * 图模型类型定义
 */

import type { DataType, Value } from '../values';
import type { InputParamKind, NodeKind } from '../templates';

/**
 * Stable handles generated by the graph. Never reused within one graph.
 * 由图生成的稳定句柄。在同一图中永不复用。
 */
export type NodeId = `node-${number}`;
export type InputId = `in-${number}`;
export type OutputId = `out-${number}`;

/**
 * Named reference to a port owned by a node
 * 对节点所拥有端口的命名引用
 */
export interface PortRef<Id extends InputId | OutputId> {
  readonly name: string;
  readonly id: Id;
}

/**
 * Input port
 * 输入端口
 */
export interface InputPort {
  readonly id: InputId;
  /** Owning node 所属节点 */
  readonly nodeId: NodeId;
  readonly name: string;
  readonly dataType: DataType;
  /** Constant used while unconnected 未连接时使用的常量 */
  value: Value;
  readonly kind: InputParamKind;
  /** Whether the editor shows an inline widget 编辑器是否显示内联控件 */
  readonly shownInline: boolean;
}

/**
 * Output port
 * 输出端口
 */
export interface OutputPort {
  readonly id: OutputId;
  readonly nodeId: NodeId;
  readonly name: string;
  readonly dataType: DataType;
}

/**
 * Node instance
 * 节点实例
 */
export interface GraphNode {
  readonly id: NodeId;
  readonly kind: NodeKind;
  label: string;
  readonly inputs: ReadonlyArray<PortRef<InputId>>;
  readonly outputs: ReadonlyArray<PortRef<OutputId>>;
}

/**
 * Directed edge from an output to an input
 * 从输出到输入的有向边
 */
export interface Connection {
  readonly output: OutputId;
  readonly input: InputId;
}

/**
 * Read-only view of a graph consumed by the evaluator
 * 求值器使用的图只读视图
 */
export interface GraphView {
  getNode(id: NodeId): GraphNode | undefined;
  getInput(id: InputId): InputPort | undefined;
  getOutput(id: OutputId): OutputPort | undefined;
  /** Upstream output feeding an input, if any 为输入提供值的上游输出（如有） */
  getConnection(input: InputId): OutputId | undefined;
}

const NODE_ID_PATTERN = /^node-\d+$/;
const INPUT_ID_PATTERN = /^in-\d+$/;
const OUTPUT_ID_PATTERN = /^out-\d+$/;

export function isNodeId(value: string): value is NodeId {
  return NODE_ID_PATTERN.test(value);
}

export function isInputId(value: string): value is InputId {
  return INPUT_ID_PATTERN.test(value);
}

export function isOutputId(value: string): value is OutputId {
  return OUTPUT_ID_PATTERN.test(value);
}

/**
 * Numeric part of a generated id
 * 生成的ID的数字部分
 */
export function idSequence(id: NodeId | InputId | OutputId): number {
  return Number(id.slice(id.indexOf('-') + 1));
}

/**
 * Find an input of a node by name
 * 按名称查找节点的输入
 */
export function findInputRef(node: GraphNode, name: string): PortRef<InputId> | undefined {
  return node.inputs.find(port => port.name === name);
}

export function findOutputRef(node: GraphNode, name: string): PortRef<OutputId> | undefined {
  return node.outputs.find(port => port.name === name);
}
