#!/usr/bin/env node

/**
 * CLI tool for evaluating saved node graphs
 * 对已保存节点图求值的CLI工具
 *
 * Loads graph documents (JSON or MessagePack), evaluates the requested nodes
 * and prints their values, optionally with table previews.
 * 加载图文档（JSON或MessagePack），对请求的节点求值并打印其值，可选输出表格预览。
 */

import * as fs from 'fs';
import * as path from 'path';
import { program } from 'commander';
import chalk from 'chalk';
import { globSync, hasMagic } from 'glob';
import { GraphSerializer } from '../src/serialization';
import { EvaluationEngine } from '../src/evaluation';
import type { EvaluatorOptions } from '../src/evaluation';
import type { NodeGraph, NodeId } from '../src/graph';
import { isNodeId } from '../src/graph';
import { tablePreview } from '../src/inspector';
import type { TablePreview } from '../src/inspector';
import { formatValue } from '../src/values';

/**
 * CLI configuration interface
 * CLI配置接口
 */
export interface CLIConfig {
  input: string[];
  /** Nodes to evaluate; empty means active node, then sinks 要求值的节点；为空表示活动节点，其次为汇节点 */
  nodes: NodeId[];
  delimiter: string;
  /** Dependency depth limit; unset leaves the evaluator default 依赖深度限制；未设置时使用求值器默认值 */
  maxDepth?: number;
  detectCycles: boolean;
  preview: boolean;
  json: boolean;
}

/**
 * Result of one node evaluation
 * 单个节点求值结果
 */
export interface NodeReport {
  nodeId: NodeId;
  kind: string;
  success: boolean;
  /** Formatted value or error message 格式化值或错误信息 */
  output: string;
  executionTime: number;
  table?: TablePreview;
}

/**
 * Result of one document
 * 单个文档的结果
 */
export interface FileReport {
  filePath: string;
  success: boolean;
  error?: string;
  nodes: NodeReport[];
}

const PREVIEW_ROWS = 10;

/**
 * Main CLI class
 * 主要CLI类
 */
export class GraphEvaluatorCLI {
  private readonly serializer = new GraphSerializer();

  /**
   * Load a document; .msgpack and .bin files are binary, everything else JSON
   * 加载文档；.msgpack和.bin文件为二进制，其余为JSON
   */
  loadFile(filePath: string): { graph: NodeGraph; activeNode: NodeId | null } {
    const ext = path.extname(filePath).toLowerCase();
    const data = ext === '.msgpack' || ext === '.bin'
      ? new Uint8Array(fs.readFileSync(filePath))
      : fs.readFileSync(filePath, 'utf-8');
    return this.serializer.deserialize(data);
  }

  /**
   * Pick the nodes to evaluate
   * 选择要求值的节点
   */
  selectNodes(graph: NodeGraph, activeNode: NodeId | null, requested: readonly NodeId[]): NodeId[] {
    if (requested.length > 0) {
      return [...requested];
    }
    if (activeNode && graph.hasNode(activeNode)) {
      return [activeNode];
    }
    return graph.getSinkNodes().map(node => node.id);
  }

  /**
   * Evaluate a single document
   * 对单个文档求值
   */
  evaluateFile(filePath: string, config: CLIConfig): FileReport {
    let loaded: { graph: NodeGraph; activeNode: NodeId | null };
    try {
      loaded = this.loadFile(filePath);
    } catch (error) {
      return {
        filePath,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nodes: []
      };
    }

    const { graph, activeNode } = loaded;
    const evaluator: Partial<EvaluatorOptions> = {
      detectCycles: config.detectCycles,
      maxDepth: config.maxDepth,
      csv: { delimiter: config.delimiter }
    };
    const engine = new EvaluationEngine({ evaluator });

    const nodes = this.selectNodes(graph, activeNode, config.nodes).map((nodeId): NodeReport => {
      const result = engine.evaluate(graph, nodeId);
      const kind = graph.getNode(nodeId)?.kind ?? 'unknown';

      if (!result.success) {
        return { nodeId, kind, success: false, output: result.error.message, executionTime: result.executionTime };
      }

      const report: NodeReport = {
        nodeId,
        kind,
        success: true,
        output: formatValue(result.value),
        executionTime: result.executionTime
      };
      if (config.preview && result.value.type === 'frame') {
        report.table = tablePreview(result.value.value, PREVIEW_ROWS);
      }
      return report;
    });

    return { filePath, success: nodes.every(node => node.success), nodes };
  }

  /**
   * Expand glob patterns into a de-duplicated file list
   * 将glob模式展开为去重的文件列表
   */
  expandInputs(patterns: readonly string[]): string[] {
    const inputFiles = new Set<string>();
    for (const pattern of patterns) {
      if (hasMagic(pattern)) {
        globSync(pattern, { absolute: true }).sort().forEach(file => inputFiles.add(file));
      } else {
        inputFiles.add(path.resolve(pattern));
      }
    }
    return Array.from(inputFiles);
  }

  /**
   * Evaluate every input document and print the results
   * 对每个输入文档求值并打印结果
   */
  run(config: CLIConfig): FileReport[] {
    const files = this.expandInputs(config.input);

    if (files.length === 0) {
      console.log(chalk.yellow('⚠️  No input files found'));
      return [];
    }

    const reports = files.map(file => this.evaluateFile(file, config));

    if (config.json) {
      console.log(JSON.stringify(reports, null, 2));
    } else {
      reports.forEach(report => this.printReport(report));
      this.printSummary(reports);
    }

    return reports;
  }

  private printReport(report: FileReport): void {
    console.log(chalk.blue(`📖 ${path.relative(process.cwd(), report.filePath)}`));

    if (report.error !== undefined) {
      console.log(chalk.red(`   └── ${report.error}`));
      return;
    }
    if (report.nodes.length === 0) {
      console.log(chalk.yellow('   └── Graph has no nodes'));
      return;
    }

    for (const node of report.nodes) {
      const label = `${node.nodeId} (${node.kind})`;
      if (node.success) {
        console.log(chalk.green(`   ✅ ${label}: ${node.output}`) + chalk.gray(` ${node.executionTime.toFixed(2)}ms`));
      } else {
        console.log(chalk.red(`   ❌ ${label}: ${node.output}`));
      }
      if (node.table) {
        this.printTable(node.table);
      }
    }
  }

  private printTable(table: TablePreview): void {
    const [rows, cols] = table.shape;
    const render = (cells: ReadonlyArray<string | null>): string =>
      cells.map(cell => cell ?? chalk.gray('null')).join(' | ');

    console.log(chalk.cyan(`      shape: (${rows}, ${cols})`));
    console.log(chalk.bold(`      ${table.header.join(' | ')}`));
    table.rows.forEach(row => console.log(`      ${render(row)}`));
    if (rows > table.rows.length) {
      console.log(chalk.gray(`      … ${rows - table.rows.length} more row(s)`));
    }
  }

  private printSummary(reports: readonly FileReport[]): void {
    const evaluated = reports.flatMap(report => report.nodes);
    const failedNodes = evaluated.filter(node => !node.success).length;
    const failedFiles = reports.filter(report => report.error !== undefined).length;

    console.log('');
    console.log(chalk.blue('📊 Evaluation Summary:'));
    console.log(chalk.green(`   ✅ Evaluated: ${evaluated.length - failedNodes}`));
    if (failedNodes > 0) {
      console.log(chalk.red(`   ❌ Failed: ${failedNodes}`));
    }
    if (failedFiles > 0) {
      console.log(chalk.red(`   ❌ Unreadable documents: ${failedFiles}`));
    }
  }
}

/**
 * Parse the --node option values
 * 解析--node选项的值
 */
export function parseNodeIds(values: readonly string[]): NodeId[] {
  return values.map(value => {
    if (!isNodeId(value)) {
      throw new Error(`Invalid node id '${value}' (expected node-<n>)`);
    }
    return value;
  });
}

/**
 * Parse the --max-depth option value
 * 解析--max-depth选项的值
 */
export function parseMaxDepth(value: string): number {
  if (value === 'Infinity') {
    return Infinity;
  }
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new Error(`Invalid max depth '${value}'`);
  }
  return depth;
}

interface CommandOptions {
  node?: string[];
  delimiter: string;
  maxDepth?: string;
  cycleCheck: boolean;
  preview?: boolean;
  json?: boolean;
}

/**
 * Main program entry point
 * 主程序入口点
 */
async function main(): Promise<void> {
  program
    .name('nodeframe-eval')
    .description('Evaluate nodes of saved dataflow graphs')
    .version('0.1.0');

  program
    .argument('<documents...>', 'Graph documents (supports glob patterns)')
    .option('-n, --node <id...>', 'Node ids to evaluate (defaults to the active node, then sink nodes)')
    .option('--delimiter <char>', 'CSV field delimiter', ',')
    .option('--max-depth <n>', 'Longest dependency chain to follow (unbounded unless --no-cycle-check, then 512)')
    .option('--no-cycle-check', 'Disable dependency cycle detection')
    .option('--preview', 'Print table previews for frame results')
    .option('--json', 'Print results as JSON')
    .action((input: string[], options: CommandOptions) => {
      try {
        const config: CLIConfig = {
          input,
          nodes: parseNodeIds(options.node ?? []),
          delimiter: options.delimiter,
          maxDepth: options.maxDepth === undefined ? undefined : parseMaxDepth(options.maxDepth),
          detectCycles: options.cycleCheck,
          preview: options.preview === true,
          json: options.json === true
        };

        const reports = new GraphEvaluatorCLI().run(config);
        const failed = reports.length === 0 || reports.some(report => !report.success);
        process.exit(failed ? 1 : 0);
      } catch (error) {
        console.error(chalk.red('❌ Fatal error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  program.addHelpText('after', `
Examples:
  nodeframe-eval graph.json                      # Evaluate the active node or sinks
  nodeframe-eval "graphs/*.json" --preview       # Evaluate all graphs with tables
  nodeframe-eval graph.json -n node-4 node-9     # Evaluate specific nodes
  nodeframe-eval data.json --delimiter ";"       # Semicolon separated CSV files
`);

  await program.parseAsync();
}

// Run the CLI tool 运行CLI工具
if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('❌ Unhandled error:'), error);
    process.exit(1);
  });
}
