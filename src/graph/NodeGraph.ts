/**
 * Node graph store
 * 节点图存储
 *
 * Arena of nodes, ports and connections addressed by generated ids.
 * Editors mutate the graph through this class; the evaluator only reads it
 * through the GraphView interface.
 * 由生成的ID寻址的节点、端口和连接的存储区。
 * 编辑器通过此类修改图；求值器仅通过GraphView接口读取。
 */

import type { DataType, Value } from '../values';
import type { InputParamKind, NodeKind } from '../templates';
import { getNodeTemplate, defaultValueFor, DATA_TYPE_INFO } from '../templates';
import { TypeMismatchError, UnknownNodeError, ConnectionError, GraphDocumentError } from '../errors';
import type { GraphDocument, NodeRecord } from '../serialization/types';
import { GRAPH_DOCUMENT_VERSION } from '../serialization/types';
import type {
  Connection,
  GraphNode,
  GraphView,
  InputId,
  InputPort,
  NodeId,
  OutputId,
  OutputPort,
  PortRef
} from './types';
import { idSequence } from './types';

/**
 * Mutable node storage
 * 可变节点存储
 */
interface NodeEntry {
  readonly id: NodeId;
  readonly kind: NodeKind;
  label: string;
  inputs: PortRef<InputId>[];
  outputs: PortRef<OutputId>[];
}

/**
 * Node graph
 * 节点图
 */
export class NodeGraph implements GraphView {
  /** Graph name 图名称 */
  public name: string;

  private nodes = new Map<NodeId, NodeEntry>();

  private inputs = new Map<InputId, InputPort>();

  private outputs = new Map<OutputId, OutputPort>();

  /** Incoming connection per input 每个输入的入边连接 */
  private connections = new Map<InputId, OutputId>();

  /** Next id sequence number 下一个ID序号 */
  private nextId = 1;

  constructor(name: string = 'Untitled graph') {
    this.name = name;
  }

  /**
   * Instantiate a node from its template
   * 从模板实例化节点
   *
   * @param kind Node kind 节点类型
   * @param label Optional label, defaults to the finder label 可选标签，默认为查找器标签
   * @returns New node id 新节点ID
   */
  addNode(kind: NodeKind, label?: string): NodeId {
    const template = getNodeTemplate(kind);
    const nodeId = this.addEmptyNode(kind, label ?? template.label);

    for (const decl of template.inputs) {
      this.addInputParam(nodeId, decl.name, decl.type, defaultValueFor(decl.type), decl.kind, decl.shownInline);
    }
    for (const decl of template.outputs) {
      this.addOutputParam(nodeId, decl.name, decl.type);
    }

    return nodeId;
  }

  /**
   * Create a node without ports
   * 创建没有端口的节点
   */
  addEmptyNode(kind: NodeKind, label: string): NodeId {
    const id: NodeId = `node-${this.nextId++}`;
    this.nodes.set(id, { id, kind, label, inputs: [], outputs: [] });
    return id;
  }

  /**
   * Add an input port to a node
   * 向节点添加输入端口
   *
   * @throws TypeMismatchError when the constant does not match the data type 常量与数据类型不匹配时抛出
   */
  addInputParam(
    nodeId: NodeId,
    name: string,
    dataType: DataType,
    value: Value,
    kind: InputParamKind = 'connectionOrConstant',
    shownInline: boolean = true
  ): InputId {
    const node = this.requireNode(nodeId);
    if (node.inputs.some(port => port.name === name)) {
      throw new Error(`Node '${nodeId}' already has an input named '${name}'`);
    }
    if (value.type !== dataType) {
      throw new TypeMismatchError(dataType, value.type);
    }

    const id: InputId = `in-${this.nextId++}`;
    this.inputs.set(id, { id, nodeId, name, dataType, value, kind, shownInline });
    node.inputs.push({ name, id });
    return id;
  }

  /**
   * Add an output port to a node
   * 向节点添加输出端口
   */
  addOutputParam(nodeId: NodeId, name: string, dataType: DataType): OutputId {
    const node = this.requireNode(nodeId);
    if (node.outputs.some(port => port.name === name)) {
      throw new Error(`Node '${nodeId}' already has an output named '${name}'`);
    }

    const id: OutputId = `out-${this.nextId++}`;
    this.outputs.set(id, { id, nodeId, name, dataType });
    node.outputs.push({ name, id });
    return id;
  }

  /**
   * Remove a node, its ports and every connection touching them
   * 移除节点、其端口以及与之相关的所有连接
   *
   * @returns Removed connections 被移除的连接
   */
  removeNode(nodeId: NodeId): Connection[] {
    const node = this.nodes.get(nodeId);
    if (!node) {
      return [];
    }

    const removed: Connection[] = [];
    const ownOutputs = new Set<OutputId>(node.outputs.map(port => port.id));
    const ownInputs = new Set<InputId>(node.inputs.map(port => port.id));

    for (const [input, output] of Array.from(this.connections)) {
      if (ownInputs.has(input) || ownOutputs.has(output)) {
        this.connections.delete(input);
        removed.push({ output, input });
      }
    }

    for (const id of ownInputs) this.inputs.delete(id);
    for (const id of ownOutputs) this.outputs.delete(id);
    this.nodes.delete(nodeId);

    return removed;
  }

  getNode(id: NodeId): GraphNode | undefined {
    return this.nodes.get(id);
  }

  hasNode(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  getInput(id: InputId): InputPort | undefined {
    return this.inputs.get(id);
  }

  getOutput(id: OutputId): OutputPort | undefined {
    return this.outputs.get(id);
  }

  getConnection(input: InputId): OutputId | undefined {
    return this.connections.get(input);
  }

  /**
   * Find an input of a node by name
   * 按名称查找节点的输入
   */
  findInput(nodeId: NodeId, name: string): InputPort | undefined {
    const ref = this.nodes.get(nodeId)?.inputs.find(port => port.name === name);
    return ref ? this.inputs.get(ref.id) : undefined;
  }

  findOutput(nodeId: NodeId, name: string): OutputPort | undefined {
    const ref = this.nodes.get(nodeId)?.outputs.find(port => port.name === name);
    return ref ? this.outputs.get(ref.id) : undefined;
  }

  getAllNodes(): GraphNode[] {
    return Array.from(this.nodes.values());
  }

  getAllConnections(): Connection[] {
    return Array.from(this.connections, ([input, output]) => ({ output, input }));
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  /**
   * Inputs fed by an output
   * 由某个输出提供值的输入
   */
  connectionsFrom(output: OutputId): InputId[] {
    const targets: InputId[] = [];
    for (const [input, source] of this.connections) {
      if (source === output) targets.push(input);
    }
    return targets;
  }

  /**
   * Nodes whose outputs feed nothing
   * 输出未连接到任何地方的节点
   */
  getSinkNodes(): GraphNode[] {
    const feeding = new Set<NodeId>();
    for (const output of this.connections.values()) {
      const port = this.outputs.get(output);
      if (port) feeding.add(port.nodeId);
    }
    return this.getAllNodes().filter(node => !feeding.has(node.id));
  }

  /**
   * Validate a connection between an output and an input
   * 验证输出与输入之间的连接
   *
   * Cycles are allowed here; the evaluator reports them.
   * 此处允许循环；由求值器报告。
   */
  validateConnection(output: OutputId, input: InputId): { valid: boolean; error?: string } {
    const source = this.outputs.get(output);
    const target = this.inputs.get(input);

    if (!source) {
      return { valid: false, error: `Output '${output}' not found` };
    }
    if (!target) {
      return { valid: false, error: `Input '${input}' not found` };
    }
    if (source.dataType !== target.dataType) {
      return {
        valid: false,
        error: `Cannot connect ${DATA_TYPE_INFO[source.dataType].name} output to ${DATA_TYPE_INFO[target.dataType].name} input`
      };
    }
    if (target.kind === 'constantOnly') {
      return { valid: false, error: `Input '${target.name}' does not accept connections` };
    }
    if (this.connections.has(input)) {
      return { valid: false, error: 'Target input is already connected' };
    }

    return { valid: true };
  }

  /**
   * Connect an output to an input
   * 将输出连接到输入
   *
   * @throws ConnectionError when validation fails 验证失败时抛出
   */
  connect(output: OutputId, input: InputId): Connection {
    const validation = this.validateConnection(output, input);
    if (!validation.valid) {
      throw new ConnectionError(validation.error ?? 'unknown reason');
    }

    this.connections.set(input, output);
    return { output, input };
  }

  /**
   * Remove the connection feeding an input
   * 移除为输入提供值的连接
   *
   * @returns Whether a connection was removed 是否移除了连接
   */
  disconnect(input: InputId): boolean {
    return this.connections.delete(input);
  }

  /**
   * Set the constant of an input
   * 设置输入的常量
   */
  setInputValue(input: InputId, value: Value): void {
    const port = this.inputs.get(input);
    if (!port) {
      throw new Error(`Input '${input}' not found`);
    }
    if (port.kind === 'connectionOnly') {
      throw new Error(`Input '${port.name}' only accepts connections`);
    }
    if (value.type !== port.dataType) {
      throw new TypeMismatchError(port.dataType, value.type);
    }
    port.value = value;
  }

  /**
   * Check whether the connections form a cycle
   * 检查连接是否形成循环
   */
  hasCycle(): boolean {
    const adjacency = new Map<NodeId, NodeId[]>();
    for (const [input, output] of this.connections) {
      const from = this.outputs.get(output)?.nodeId;
      const to = this.inputs.get(input)?.nodeId;
      if (from && to) {
        const targets = adjacency.get(from);
        if (targets) {
          targets.push(to);
        } else {
          adjacency.set(from, [to]);
        }
      }
    }

    const visited = new Set<NodeId>();
    const recursionStack = new Set<NodeId>();

    const visit = (nodeId: NodeId): boolean => {
      visited.add(nodeId);
      recursionStack.add(nodeId);

      for (const target of adjacency.get(nodeId) ?? []) {
        if (!visited.has(target)) {
          if (visit(target)) return true;
        } else if (recursionStack.has(target)) {
          return true;
        }
      }

      recursionStack.delete(nodeId);
      return false;
    };

    for (const nodeId of this.nodes.keys()) {
      if (!visited.has(nodeId) && visit(nodeId)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Snapshot the graph as a document
   * 将图快照为文档
   */
  toDocument(activeNode: NodeId | null = null): GraphDocument {
    const nodes: NodeRecord[] = [];
    for (const node of this.nodes.values()) {
      nodes.push({
        id: node.id,
        kind: node.kind,
        label: node.label,
        inputs: node.inputs.map(ref => {
          const port = this.requireInput(ref.id);
          return {
            id: port.id,
            name: port.name,
            type: port.dataType,
            kind: port.kind,
            shownInline: port.shownInline,
            value: port.value
          };
        }),
        outputs: node.outputs.map(ref => {
          const port = this.requireOutput(ref.id);
          return { id: port.id, name: port.name, type: port.dataType };
        })
      });
    }

    return {
      version: GRAPH_DOCUMENT_VERSION,
      name: this.name,
      nextId: this.nextId,
      nodes,
      connections: Array.from(this.connections, ([input, output]): [OutputId, InputId] => [output, input]),
      activeNode: activeNode !== null && this.nodes.has(activeNode) ? activeNode : null
    };
  }

  /**
   * Rebuild a graph from a document, keeping every id
   * 从文档重建图，保留所有ID
   *
   * @throws GraphDocumentError on duplicate ids or invalid connections 当ID重复或连接无效时抛出
   */
  static fromDocument(doc: GraphDocument): NodeGraph {
    const graph = new NodeGraph(doc.name);
    let maxSequence = 0;

    const claim = (id: NodeId | InputId | OutputId, taken: boolean): void => {
      if (taken) {
        throw new GraphDocumentError(`Duplicate id '${id}' in graph document`);
      }
      maxSequence = Math.max(maxSequence, idSequence(id));
    };

    for (const record of doc.nodes) {
      claim(record.id, graph.nodes.has(record.id));
      const entry: NodeEntry = { id: record.id, kind: record.kind, label: record.label, inputs: [], outputs: [] };
      graph.nodes.set(record.id, entry);

      for (const port of record.inputs) {
        claim(port.id, graph.inputs.has(port.id) || entry.inputs.some(ref => ref.name === port.name));
        if (port.value.type !== port.type) {
          throw new GraphDocumentError(
            `Input '${port.id}' declares type ${port.type} but stores a ${port.value.type} value`
          );
        }
        graph.inputs.set(port.id, {
          id: port.id,
          nodeId: record.id,
          name: port.name,
          dataType: port.type,
          value: port.value,
          kind: port.kind,
          shownInline: port.shownInline
        });
        entry.inputs.push({ name: port.name, id: port.id });
      }

      for (const port of record.outputs) {
        claim(port.id, graph.outputs.has(port.id) || entry.outputs.some(ref => ref.name === port.name));
        graph.outputs.set(port.id, { id: port.id, nodeId: record.id, name: port.name, dataType: port.type });
        entry.outputs.push({ name: port.name, id: port.id });
      }
    }

    graph.nextId = Math.max(doc.nextId, maxSequence + 1);

    for (const [output, input] of doc.connections) {
      const validation = graph.validateConnection(output, input);
      if (!validation.valid) {
        throw new GraphDocumentError(`Invalid connection ${output} -> ${input}: ${validation.error ?? 'unknown reason'}`);
      }
      graph.connections.set(input, output);
    }

    return graph;
  }

  private requireNode(nodeId: NodeId): NodeEntry {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new UnknownNodeError(nodeId);
    }
    return node;
  }

  private requireInput(id: InputId): InputPort {
    const port = this.inputs.get(id);
    if (!port) {
      throw new Error(`Input '${id}' not found`);
    }
    return port;
  }

  private requireOutput(id: OutputId): OutputPort {
    const port = this.outputs.get(id);
    if (!port) {
      throw new Error(`Output '${id}' not found`);
    }
    return port;
  }
}
