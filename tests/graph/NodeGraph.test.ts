/**
 * Tests for the node graph store
 * 节点图存储测试
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { NodeGraph, isNodeId, isInputId, isOutputId, idSequence } from '../../src/graph';
import type { InputId, OutputId } from '../../src/graph';
import { ConnectionError, GraphDocumentError, TypeMismatchError, UnknownNodeError } from '../../src/errors';
import { scalar, text, vector2 } from '../../src/values';
import { inputOf, link, outputOf, setConstant } from '../graphHelpers';

describe('NodeGraph', () => {
  let graph: NodeGraph;

  beforeEach(() => {
    graph = new NodeGraph('Test graph');
  });

  describe('Nodes', () => {
    test('should instantiate nodes from their templates with sequential ids', () => {
      const make = graph.addNode('MakeScalar');
      const add = graph.addNode('AddScalar');

      expect(make).toBe('node-1');
      expect(graph.getNode(make)).toEqual({
        id: 'node-1',
        kind: 'MakeScalar',
        label: 'New scalar',
        inputs: [{ name: 'value', id: 'in-2' }],
        outputs: [{ name: 'out', id: 'out-3' }]
      });

      expect(add).toBe('node-4');
      expect(graph.getNode(add)?.inputs).toEqual([{ name: 'A', id: 'in-5' }, { name: 'B', id: 'in-6' }]);
      expect(graph.getInput('in-5')).toEqual({
        id: 'in-5',
        nodeId: 'node-4',
        name: 'A',
        dataType: 'scalar',
        value: scalar(0),
        kind: 'connectionOrConstant',
        shownInline: true
      });
      expect(graph.nodeCount).toBe(2);
    });

    test('should use a custom label', () => {
      const id = graph.addNode('LoadCSV', 'Sales data');
      expect(graph.getNode(id)?.label).toBe('Sales data');
      expect(graph.findInput(id, 'path')?.value).toEqual(text(''));
    });

    test('should build nodes port by port', () => {
      const id = graph.addEmptyNode('AddScalar', 'Manual');
      graph.addInputParam(id, 'A', 'scalar', scalar(1));
      graph.addOutputParam(id, 'out', 'scalar');

      expect(graph.getNode(id)?.inputs.map(port => port.name)).toEqual(['A']);
      expect(() => graph.addInputParam(id, 'A', 'scalar', scalar(2))).toThrow("Node 'node-1' already has an input named 'A'");
      expect(() => graph.addOutputParam(id, 'out', 'scalar')).toThrow("Node 'node-1' already has an output named 'out'");
      expect(() => graph.addInputParam(id, 'B', 'scalar', text('x'))).toThrow(TypeMismatchError);
      expect(() => graph.addInputParam('node-42', 'A', 'scalar', scalar(0))).toThrow(UnknownNodeError);
    });

    test('should never reuse ids after removal', () => {
      const first = graph.addNode('MakeScalar');
      graph.removeNode(first);
      const second = graph.addNode('MakeScalar');

      expect(second).toBe('node-4');
      expect(graph.hasNode(first)).toBe(false);
      expect(graph.getInput('in-2')).toBeUndefined();
    });

    test('should cascade connection removal', () => {
      const a = graph.addNode('MakeScalar');
      const b = graph.addNode('AddScalar');
      const c = graph.addNode('AddScalar');
      link(graph, a, b, 'A');
      link(graph, b, c, 'A');

      const removed = graph.removeNode(b);

      expect(removed).toEqual([
        { output: outputOf(graph, a), input: 'in-5' },
        { output: 'out-7', input: inputOf(graph, c, 'A') }
      ]);
      expect(graph.getAllConnections()).toEqual([]);
      expect(graph.getOutput('out-7')).toBeUndefined();
      expect(graph.removeNode(b)).toEqual([]);
    });

    test('should list sink nodes', () => {
      const a = graph.addNode('MakeScalar');
      const b = graph.addNode('AddScalar');
      const c = graph.addNode('MakeVector');
      link(graph, a, b, 'A');

      expect(graph.getSinkNodes().map(node => node.id)).toEqual([b, c]);
    });
  });

  describe('Connections', () => {
    test('should connect matching ports', () => {
      const a = graph.addNode('MakeScalar');
      const b = graph.addNode('AddScalar');
      const c = graph.addNode('SubtractScalar');

      const connection = graph.connect(outputOf(graph, a), inputOf(graph, b, 'B'));
      link(graph, a, c, 'A');

      expect(connection).toEqual({ output: 'out-3', input: 'in-6' });
      expect(graph.getConnection('in-6')).toBe('out-3');
      expect(graph.connectionsFrom('out-3')).toEqual(['in-6', inputOf(graph, c, 'A')]);
    });

    test('should reject mismatched data types', () => {
      const vector = graph.addNode('MakeVector');
      const add = graph.addNode('AddScalar');

      const validation = graph.validateConnection(outputOf(graph, vector), inputOf(graph, add, 'A'));
      expect(validation).toEqual({ valid: false, error: 'Cannot connect 2d vector output to scalar input' });
      expect(() => link(graph, vector, add, 'A'))
        .toThrow('Invalid connection: Cannot connect 2d vector output to scalar input');
    });

    test('should reject missing ports', () => {
      const a = graph.addNode('MakeScalar');
      expect(graph.validateConnection('out-99', 'in-2')).toEqual({ valid: false, error: "Output 'out-99' not found" });
      expect(graph.validateConnection(outputOf(graph, a), 'in-99')).toEqual({ valid: false, error: "Input 'in-99' not found" });
    });

    test('should reject a second connection to the same input', () => {
      const a = graph.addNode('MakeScalar');
      const b = graph.addNode('MakeScalar');
      const sum = graph.addNode('AddScalar');
      link(graph, a, sum, 'A');

      expect(() => link(graph, b, sum, 'A')).toThrow(ConnectionError);
      expect(() => link(graph, b, sum, 'A')).toThrow('Target input is already connected');
      expect(graph.getConnection(inputOf(graph, sum, 'A'))).toBe(outputOf(graph, a));
    });

    test('should reject connections into constant-only inputs', () => {
      const a = graph.addNode('MakeScalar');
      const custom = graph.addEmptyNode('MakeScalar', 'Fixed');
      const input = graph.addInputParam(custom, 'value', 'scalar', scalar(3), 'constantOnly');

      expect(graph.validateConnection(outputOf(graph, a), input))
        .toEqual({ valid: false, error: "Input 'value' does not accept connections" });
    });

    test('should disconnect inputs', () => {
      const a = graph.addNode('MakeScalar');
      const b = graph.addNode('AddScalar');
      link(graph, a, b, 'A');

      expect(graph.disconnect(inputOf(graph, b, 'A'))).toBe(true);
      expect(graph.disconnect(inputOf(graph, b, 'A'))).toBe(false);
      expect(graph.getConnection(inputOf(graph, b, 'A'))).toBeUndefined();
    });

    test('should detect cycles', () => {
      const a = graph.addNode('AddScalar');
      const b = graph.addNode('AddScalar');
      link(graph, a, b, 'A');
      expect(graph.hasCycle()).toBe(false);

      link(graph, b, a, 'A');
      expect(graph.hasCycle()).toBe(true);
    });

    test('should detect self loops', () => {
      const a = graph.addNode('AddScalar');
      link(graph, a, a, 'B');
      expect(graph.hasCycle()).toBe(true);
    });
  });

  describe('Constants', () => {
    test('should update input constants', () => {
      const v = graph.addNode('MakeVector');
      setConstant(graph, v, 'x', scalar(2.5));
      expect(graph.findInput(v, 'x')?.value).toEqual(scalar(2.5));
    });

    test('should reject constants of the wrong type', () => {
      const v = graph.addNode('MakeVector');
      expect(() => setConstant(graph, v, 'x', vector2(1, 1))).toThrow('Invalid cast from vector2 to scalar');
    });

    test('should reject constants on connection-only inputs and unknown inputs', () => {
      const custom = graph.addEmptyNode('AddScalar', 'Wired');
      const input = graph.addInputParam(custom, 'A', 'scalar', scalar(0), 'connectionOnly', false);

      expect(() => graph.setInputValue(input, scalar(1))).toThrow("Input 'A' only accepts connections");
      expect(() => graph.setInputValue('in-77', scalar(1))).toThrow("Input 'in-77' not found");
    });
  });

  describe('Documents', () => {
    test('should round-trip through a document keeping ids', () => {
      const a = graph.addNode('MakeScalar');
      const b = graph.addNode('AddScalar');
      setConstant(graph, a, 'value', scalar(5));
      link(graph, a, b, 'A');

      const doc = graph.toDocument(b);
      expect(doc.version).toBe(1);
      expect(doc.nextId).toBe(8);
      expect(doc.connections).toEqual([['out-3', 'in-5']]);
      expect(doc.activeNode).toBe('node-4');

      const restored = NodeGraph.fromDocument(doc);
      expect(restored.name).toBe('Test graph');
      expect(restored.getAllNodes()).toEqual(graph.getAllNodes());
      expect(restored.getAllConnections()).toEqual(graph.getAllConnections());
      expect(restored.findInput(a, 'value')?.value).toEqual(scalar(5));
      expect(restored.addNode('MakeScalar')).toBe('node-8');
    });

    test('should drop an active node that does not exist', () => {
      expect(graph.toDocument('node-9').activeNode).toBeNull();
    });

    test('should reject duplicate ids', () => {
      graph.addNode('MakeScalar');
      const doc = graph.toDocument();
      const duplicated = { ...doc, nodes: [...doc.nodes, doc.nodes[0]] };

      expect(() => NodeGraph.fromDocument(duplicated)).toThrow(GraphDocumentError);
      expect(() => NodeGraph.fromDocument(duplicated)).toThrow("Duplicate id 'node-1' in graph document");
    });

    test('should reject values that do not match the port type', () => {
      graph.addNode('MakeScalar');
      const doc = graph.toDocument();
      const [node] = doc.nodes;
      const broken = {
        ...doc,
        nodes: [{ ...node, inputs: [{ ...node.inputs[0], value: text('five') }] }]
      };

      expect(() => NodeGraph.fromDocument(broken))
        .toThrow("Input 'in-2' declares type scalar but stores a text value");
    });

    test('should reject invalid connections', () => {
      graph.addNode('MakeVector');
      graph.addNode('AddScalar');
      const pair: [OutputId, InputId] = ['out-4', 'in-6'];
      const doc = { ...graph.toDocument(), connections: [pair] };

      expect(() => NodeGraph.fromDocument(doc))
        .toThrow('Invalid connection out-4 -> in-6: Cannot connect 2d vector output to scalar input');
    });

    test('should advance the id counter past every stored id', () => {
      graph.addNode('MakeScalar');
      const doc = { ...graph.toDocument(), nextId: 1 };
      expect(NodeGraph.fromDocument(doc).addNode('MakeScalar')).toBe('node-4');
    });
  });
});

describe('Identifiers', () => {
  test('should recognise generated ids', () => {
    expect(isNodeId('node-12')).toBe(true);
    expect(isNodeId('in-12')).toBe(false);
    expect(isInputId('in-3')).toBe(true);
    expect(isOutputId('out-x')).toBe(false);
    expect(idSequence('out-42')).toBe(42);
  });
});
