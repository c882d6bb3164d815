/**
 * Node evaluator
 * 节点求值器
 *
 * Computes the value of a node by resolving its inputs depth-first. Each
 * resolved upstream output is written to the request's OutputCache, so a node
 * feeding several consumers (fan-out, diamonds) is computed once per request.
 * 通过深度优先解析输入来计算节点的值。每个已解析的上游输出都会写入本次请求的
 * OutputCache，因此为多个消费者提供值的节点在每次请求中只计算一次。
 */

import type { Value } from '../values';
import { tryScalar, tryVector2, tryText, trySeries, tryFrame } from '../values';
import type { GraphNode, GraphView, NodeId } from '../graph/types';
import { findInputRef, findOutputRef } from '../graph/types';
import {
  CacheInvariantError,
  CycleDetectedError,
  EvaluationDepthError,
  UnknownNodeError,
  UnknownPortError
} from '../errors';
import type { OutputCache } from './OutputCache';
import type { EvaluatorOptions } from './config';
import { resolveEvaluatorOptions } from './config';
import type { NodeOperation, OperationEnvironment, OperationInputs, OperationOutputs } from './operations';
import { NODE_OPERATIONS } from './operations';

/**
 * Evaluator bound to one graph and one cache
 * 绑定到一个图和一个缓存的求值器
 */
export class NodeEvaluator {
  private readonly options: EvaluatorOptions;

  private readonly environment: OperationEnvironment;

  /** Nodes currently being evaluated, outermost first 当前正在求值的节点，最外层在前 */
  private readonly stack: NodeId[] = [];

  constructor(
    private readonly graph: GraphView,
    private readonly cache: OutputCache,
    options: Partial<EvaluatorOptions> = {}
  ) {
    this.options = resolveEvaluatorOptions(options);
    this.environment = {
      csv: this.options.csv,
      readCsv: this.options.readCsv
    };
  }

  /**
   * Evaluate a node and return its designated (first declared) output
   * 对节点求值并返回其指定（首个声明的）输出
   *
   * Every declared output is written to the cache.
   * 所有声明的输出都会写入缓存。
   */
  evaluateNode(nodeId: NodeId): Value {
    const node = this.requireNode(nodeId);

    const cached = this.cachedResult(node);
    if (cached) {
      return cached;
    }

    if (this.options.detectCycles && this.stack.includes(nodeId)) {
      throw new CycleDetectedError([...this.stack.slice(this.stack.indexOf(nodeId)), nodeId]);
    }
    if (this.stack.length >= this.options.maxDepth) {
      throw new EvaluationDepthError(nodeId, this.options.maxDepth);
    }

    this.stack.push(nodeId);
    try {
      const produced = this.operationFor(node)(this.inputsOf(nodeId), this.environment);
      const result = this.populateOutputs(node, produced);

      if (this.options.debug) {
        console.debug(`[NodeEvaluator] ${node.id} (${node.kind}) evaluated at depth ${this.stack.length}`);
      }
      return result;
    } finally {
      this.stack.pop();
    }
  }

  /**
   * Resolve the effective value of an input
   * 解析输入的有效值
   *
   * Connected inputs read the upstream output from the cache, evaluating the
   * node that owns it on a miss. Unconnected inputs return their constant.
   * 已连接的输入从缓存读取上游输出，未命中时对拥有该输出的节点求值。
   * 未连接的输入返回其常量。
   */
  resolveInput(nodeId: NodeId, portName: string): Value {
    const node = this.requireNode(nodeId);
    const ref = findInputRef(node, portName);
    if (!ref) {
      throw new UnknownPortError(nodeId, portName, 'input');
    }

    const upstream = this.graph.getConnection(ref.id);
    if (upstream !== undefined) {
      const hit = this.cache.get(upstream);
      if (hit) {
        return hit;
      }

      const source = this.graph.getOutput(upstream);
      if (!source) {
        throw new CacheInvariantError(nodeId, upstream);
      }

      // Evaluate the node owning the upstream output, not this one
      // 对拥有上游输出的节点求值，而不是当前节点
      this.evaluateNode(source.nodeId);

      const computed = this.cache.get(upstream);
      if (!computed) {
        throw new CacheInvariantError(source.nodeId, upstream);
      }
      return computed;
    }

    const port = this.graph.getInput(ref.id);
    if (!port) {
      throw new UnknownPortError(nodeId, portName, 'input');
    }
    return port.value;
  }

  /**
   * Write a node output to the cache and return it
   * 将节点输出写入缓存并返回
   */
  populateOutput(nodeId: NodeId, outputName: string, value: Value): Value {
    const node = this.requireNode(nodeId);
    const ref = findOutputRef(node, outputName);
    if (!ref) {
      throw new UnknownPortError(nodeId, outputName, 'output');
    }

    this.cache.set(ref.id, value);
    return value;
  }

  private populateOutputs(node: GraphNode, produced: OperationOutputs): Value {
    for (const name of Object.keys(produced)) {
      if (!findOutputRef(node, name)) {
        throw new UnknownPortError(node.id, name, 'output');
      }
    }

    let designated: Value | undefined;
    for (const ref of node.outputs) {
      const value = Object.prototype.hasOwnProperty.call(produced, ref.name) ? produced[ref.name] : undefined;
      if (value === undefined) {
        throw new UnknownPortError(node.id, ref.name, 'output');
      }
      const stored = this.populateOutput(node.id, ref.name, value);
      designated ??= stored;
    }

    if (!designated) {
      throw new UnknownPortError(node.id, '(designated)', 'output');
    }
    return designated;
  }

  /**
   * Designated output when every output of the node is already cached
   * 当节点的所有输出都已缓存时返回指定输出
   */
  private cachedResult(node: GraphNode): Value | undefined {
    if (node.outputs.length === 0 || !node.outputs.every(ref => this.cache.has(ref.id))) {
      return undefined;
    }
    return this.cache.get(node.outputs[0].id);
  }

  private operationFor(node: GraphNode): NodeOperation {
    return this.options.operations[node.kind] ?? NODE_OPERATIONS[node.kind];
  }

  private inputsOf(nodeId: NodeId): OperationInputs {
    const value = (name: string): Value => this.resolveInput(nodeId, name);
    return {
      value,
      scalar: name => tryScalar(value(name)),
      vector2: name => tryVector2(value(name)),
      text: name => tryText(value(name)),
      series: name => trySeries(value(name)),
      frame: name => tryFrame(value(name))
    };
  }

  private requireNode(nodeId: NodeId): GraphNode {
    const node = this.graph.getNode(nodeId);
    if (!node) {
      throw new UnknownNodeError(nodeId);
    }
    return node;
  }
}

/**
 * Evaluate a node against a caller-owned cache
 * 使用调用方拥有的缓存对节点求值
 *
 * @throws EvaluationError on the first failure in the dependency chain 依赖链中出现首个失败时抛出
 */
export function evaluateNode(
  graph: GraphView,
  nodeId: NodeId,
  cache: OutputCache,
  options: Partial<EvaluatorOptions> = {}
): Value {
  return new NodeEvaluator(graph, cache, options).evaluateNode(nodeId);
}

export function resolveInput(
  graph: GraphView,
  nodeId: NodeId,
  portName: string,
  cache: OutputCache,
  options: Partial<EvaluatorOptions> = {}
): Value {
  return new NodeEvaluator(graph, cache, options).resolveInput(nodeId, portName);
}

export function populateOutput(
  graph: GraphView,
  cache: OutputCache,
  nodeId: NodeId,
  outputName: string,
  value: Value
): Value {
  return new NodeEvaluator(graph, cache).populateOutput(nodeId, outputName, value);
}
