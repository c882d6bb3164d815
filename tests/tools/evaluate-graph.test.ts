/**
 * Tests for the graph evaluation CLI
 * 图求值CLI测试
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, test, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import { GraphEvaluatorCLI, parseMaxDepth, parseNodeIds } from '../../tools/evaluate-graph';
import type { CLIConfig } from '../../tools/evaluate-graph';
import { NodeGraph } from '../../src/graph';
import { GraphSerializer, GraphFormat } from '../../src/serialization';
import { scalar, text } from '../../src/values';
import { link, setConstant } from '../graphHelpers';

function config(overrides: Partial<CLIConfig> = {}): CLIConfig {
  return {
    input: [],
    nodes: [],
    delimiter: ',',
    detectCycles: true,
    preview: false,
    json: false,
    ...overrides
  };
}

describe('GraphEvaluatorCLI', () => {
  const serializer = new GraphSerializer();
  let tempDir: string;
  let csvDoc: string;
  let sumDoc: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nodeframe-cli-'));

    const csvFile = path.join(tempDir, 'scores.csv');
    fs.writeFileSync(csvFile, 'player;score\nred;3\nblue;5\n');

    const csvGraph = new NodeGraph('Scores');
    const load = csvGraph.addNode('LoadCSV');
    const count = csvGraph.addNode('CountRows');
    setConstant(csvGraph, load, 'path', text(csvFile));
    link(csvGraph, load, count, 'df');
    csvDoc = path.join(tempDir, 'scores.json');
    fs.writeFileSync(csvDoc, serializer.serialize(csvGraph).data);

    const sumGraph = new NodeGraph('Sum');
    const a = sumGraph.addNode('MakeScalar');
    const b = sumGraph.addNode('AddScalar');
    setConstant(sumGraph, a, 'value', scalar(5));
    setConstant(sumGraph, b, 'B', scalar(10));
    link(sumGraph, a, b, 'A');
    sumDoc = path.join(tempDir, 'sum.msgpack');
    fs.writeFileSync(sumDoc, serializer.serialize(sumGraph, { format: GraphFormat.Binary, activeNode: a }).data);
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should evaluate sink nodes with the configured delimiter', () => {
    const report = new GraphEvaluatorCLI().evaluateFile(csvDoc, config({ delimiter: ';' }));

    expect(report.success).toBe(true);
    expect(report.nodes.map(node => [node.nodeId, node.kind, node.output])).toEqual([
      ['node-4', 'CountRows', 'Scalar(2)']
    ]);
  });

  test('should report evaluation failures per node', () => {
    const report = new GraphEvaluatorCLI().evaluateFile(csvDoc, config({ delimiter: ';', maxDepth: 1 }));

    expect(report.success).toBe(false);
    expect(report.nodes[0]).toMatchObject({
      nodeId: 'node-4',
      success: false,
      output: "Evaluation of node 'node-1' exceeded the maximum dependency depth of 1"
    });
  });

  test('should attach table previews for frame results', () => {
    const report = new GraphEvaluatorCLI().evaluateFile(csvDoc, config({ delimiter: ';', nodes: ['node-1'], preview: true }));

    expect(report.nodes[0].output).toBe('Frame 2x2 [player, score]');
    expect(report.nodes[0].table).toEqual({
      shape: [2, 2],
      header: ['player', 'score'],
      rows: [['red', '3'], ['blue', '5']]
    });
  });

  test('should default to the active node of binary documents', () => {
    const report = new GraphEvaluatorCLI().evaluateFile(sumDoc, config());
    expect(report.nodes.map(node => node.output)).toEqual(['Scalar(5)']);
  });

  test('should report unreadable documents', () => {
    const broken = path.join(tempDir, 'broken.json');
    fs.writeFileSync(broken, '{"version": 1}');

    const report = new GraphEvaluatorCLI().evaluateFile(broken, config());
    expect(report).toEqual({ filePath: broken, success: false, error: 'document.connections: expected an array', nodes: [] });
  });

  test('should expand glob patterns', () => {
    const files = new GraphEvaluatorCLI().expandInputs([path.join(tempDir, '*.msgpack'), csvDoc, sumDoc]);
    expect(files).toEqual([sumDoc, csvDoc]);
  });

  test('should print JSON reports', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const reports = new GraphEvaluatorCLI().run(config({ input: [sumDoc], json: true }));

    expect(reports).toHaveLength(1);
    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject([
      { filePath: sumDoc, success: true, nodes: [{ nodeId: 'node-1', output: 'Scalar(5)' }] }
    ]);
  });
});

describe('Option parsing', () => {
  test('should parse node ids', () => {
    expect(parseNodeIds(['node-1', 'node-12'])).toEqual(['node-1', 'node-12']);
    expect(() => parseNodeIds(['in-1'])).toThrow("Invalid node id 'in-1' (expected node-<n>)");
  });

  test('should parse the maximum depth', () => {
    expect(parseMaxDepth('64')).toBe(64);
    expect(parseMaxDepth('Infinity')).toBe(Infinity);
    expect(() => parseMaxDepth('0')).toThrow("Invalid max depth '0'");
    expect(() => parseMaxDepth('deep')).toThrow("Invalid max depth 'deep'");
  });
});
