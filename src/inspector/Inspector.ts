/**
 * Headless node inspector
 * 无界面节点检查器
 *
 * Produces what a side panel shows for the active node: a status line, a
 * table preview for loaded frames and plot points for selected columns.
 * 生成侧边面板为活动节点显示的内容：状态行、已加载数据表的预览以及所选列的绘图点。
 */

import type { Frame, Series } from '../values';
import { formatValue, frameHeight, frameWidth, columnNames } from '../values';
import type { GraphView, NodeId } from '../graph/types';
import type { NodeKind } from '../templates';
import type { EvaluatorOptions } from '../evaluation/config';
import type { EvaluationResult } from '../evaluation/EvaluationEngine';
import { evaluate } from '../evaluation/EvaluationEngine';

/**
 * Tracks which node the inspector shows
 * 跟踪检查器显示的节点
 */
export class InspectorState {
  private activeNode: NodeId | null = null;

  getActive(): NodeId | null {
    return this.activeNode;
  }

  isActive(nodeId: NodeId): boolean {
    return this.activeNode === nodeId;
  }

  setActive(nodeId: NodeId): void {
    this.activeNode = nodeId;
  }

  clearActive(): void {
    this.activeNode = null;
  }

  /**
   * Clear the active node if it was removed from the graph
   * 如果活动节点已从图中移除则清除它
   */
  sync(graph: GraphView): NodeId | null {
    if (this.activeNode !== null && !graph.getNode(this.activeNode)) {
      this.activeNode = null;
    }
    return this.activeNode;
  }
}

/**
 * Tabular preview of a frame
 * 数据表的表格预览
 */
export interface TablePreview {
  /** [rows, columns] of the whole frame 整个数据表的[行数, 列数] */
  shape: [number, number];
  header: string[];
  /** Rendered cells, null where missing 渲染后的单元格，缺失处为null */
  rows: Array<Array<string | null>>;
}

export interface NodeInspection {
  nodeId: NodeId;
  kind: NodeKind;
  status: string;
  table?: TablePreview;
  plot?: Array<[number, number]>;
}

/**
 * Status line for an evaluation result
 * 求值结果的状态行
 */
export function describeResult(result: EvaluationResult): string {
  return result.success
    ? `The result is: ${formatValue(result.value)}`
    : `Execution error: ${result.error.message}`;
}

export function statusText(
  graph: GraphView,
  nodeId: NodeId,
  options: Partial<EvaluatorOptions> = {}
): string {
  return describeResult(evaluate(graph, nodeId, options));
}

/**
 * Build a table preview, keeping at most maxRows rows
 * 构建表格预览，最多保留maxRows行
 */
export function tablePreview(frame: Frame, maxRows: number = Infinity): TablePreview {
  const height = frameHeight(frame);
  const shown = Math.min(height, maxRows);
  const rows: Array<Array<string | null>> = [];

  for (let row = 0; row < shown; row++) {
    rows.push(frame.columns.map(column => {
      const cell = column.values[row];
      return cell === null ? null : String(cell);
    }));
  }

  return { shape: [height, frameWidth(frame)], header: columnNames(frame), rows };
}

/**
 * Line plot points [index, y]; missing or unparseable entries plot at 0
 * 折线图点[索引, y]；缺失或无法解析的项绘制为0
 */
export function plotPoints(series: Series): Array<[number, number]> {
  const values: ReadonlyArray<number | string | null> = series.values;
  return values.map((entry, index): [number, number] => {
    if (entry === null) return [index, 0];
    const y = typeof entry === 'number' ? entry : entry.trim() === '' ? NaN : Number(entry);
    return [index, Number.isFinite(y) ? y : 0];
  });
}

/**
 * Inspect a node; returns undefined when it no longer exists
 * 检查节点；节点不存在时返回undefined
 */
export function inspectNode(
  graph: GraphView,
  nodeId: NodeId,
  options: Partial<EvaluatorOptions> & { maxRows?: number } = {}
): NodeInspection | undefined {
  const node = graph.getNode(nodeId);
  if (!node) {
    return undefined;
  }

  const { maxRows, ...evaluatorOptions } = options;
  const result = evaluate(graph, nodeId, evaluatorOptions);
  const inspection: NodeInspection = { nodeId, kind: node.kind, status: describeResult(result) };

  if (node.kind === 'LoadCSV' && result.success && result.value.type === 'frame') {
    inspection.table = tablePreview(result.value.value, maxRows);
  }
  if (node.kind === 'SelectColumn') {
    inspection.plot = result.success && result.value.type === 'series' ? plotPoints(result.value.value) : [];
  }

  return inspection;
}
