import superjson from 'superjson';
import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import { GraphDocumentError } from '../errors';
import { NodeGraph } from '../graph/NodeGraph';
import type { NodeId } from '../graph/types';
import type { GraphSerializeOptions } from './types';
import { GraphFormat } from './types';
import { validateGraphDocument } from './validate';

/**
 * Serialized graph
 * 序列化后的图
 */
export interface GraphSerializationResult {
  data: string | Uint8Array;
  format: GraphFormat;
  /** Size in bytes 字节大小 */
  size: number;
}

/**
 * Loaded graph with its inspector state
 * 已加载的图及其检查器状态
 */
export interface LoadedGraph {
  graph: NodeGraph;
  activeNode: NodeId | null;
}

/**
 * Graph document serializer using Superjson and MessagePack
 * 使用Superjson和MessagePack的图文档序列化器
 *
 * @example
 * ```typescript
 * const serializer = new GraphSerializer();
 *
 * // JSON (human-readable)
 * const json = serializer.serialize(graph, { format: GraphFormat.JSON, prettyPrint: true });
 * const { graph: restored } = serializer.deserialize(json.data);
 *
 * // MessagePack (binary, compact)
 * const binary = serializer.serialize(graph, { format: GraphFormat.Binary });
 * ```
 */
export class GraphSerializer {
  /**
   * Serialize a graph to the requested format
   * 将图序列化为指定格式
   */
  serialize(
    graph: NodeGraph,
    options: GraphSerializeOptions & { activeNode?: NodeId | null } = {}
  ): GraphSerializationResult {
    const format = options.format ?? GraphFormat.JSON;
    const document = graph.toDocument(options.activeNode ?? null);

    switch (format) {
      case GraphFormat.JSON: {
        const json = superjson.stringify(document);
        const data = options.prettyPrint ? JSON.stringify(JSON.parse(json), null, 2) : json;
        return { data, format, size: new TextEncoder().encode(data).length };
      }

      case GraphFormat.Binary: {
        const data = msgpackEncode(document);
        return { data, format, size: data.length };
      }

      default:
        throw new Error(`Unsupported graph format: ${String(format)}`);
    }
  }

  /**
   * Load a graph; strings are JSON, byte arrays are MessagePack
   * 加载图；字符串为JSON，字节数组为MessagePack
   *
   * @throws GraphDocumentError when the data is not a valid graph document 数据不是有效的图文档时抛出
   */
  deserialize(data: string | Uint8Array): LoadedGraph {
    let parsed: unknown;
    try {
      parsed = typeof data === 'string' ? this.parseJson(data) : msgpackDecode(data);
    } catch (error) {
      throw new GraphDocumentError(
        `Failed to parse graph document: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const document = validateGraphDocument(parsed);
    return { graph: NodeGraph.fromDocument(document), activeNode: document.activeNode };
  }

  /**
   * Accept both superjson envelopes and plain JSON documents
   * 同时接受superjson封装和普通JSON文档
   */
  private parseJson(text: string): unknown {
    const unwrapped = superjson.parse<unknown>(text);
    if (unwrapped !== undefined) {
      return unwrapped;
    }
    const plain: unknown = JSON.parse(text);
    return plain;
  }
}
