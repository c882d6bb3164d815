import * as path from 'path';
import {
  NodeGraph,
  EvaluationEngine,
  GraphSerializer,
  GraphFormat,
  formatValue,
  inspectNode,
  scalar,
  text
} from '../src';
import type { NodeId } from '../src';

// Vector arithmetic: (MakeVector(1, 2) + MakeVector(3, 4)) * 2
const vectors = new NodeGraph('Vector arithmetic');

const a = vectors.addNode('MakeVector');
const b = vectors.addNode('MakeVector');
const sum = vectors.addNode('AddVector');
const scaled = vectors.addNode('VectorTimesScalar');

const input = (graph: NodeGraph, node: NodeId, name: string) => {
  const port = graph.findInput(node, name);
  if (!port) throw new Error(`Missing input ${name}`);
  return port.id;
};
const output = (graph: NodeGraph, node: NodeId) => {
  const port = graph.findOutput(node, 'out');
  if (!port) throw new Error('Missing output');
  return port.id;
};

vectors.setInputValue(input(vectors, a, 'x'), scalar(1));
vectors.setInputValue(input(vectors, a, 'y'), scalar(2));
vectors.setInputValue(input(vectors, b, 'x'), scalar(3));
vectors.setInputValue(input(vectors, b, 'y'), scalar(4));
vectors.connect(output(vectors, a), input(vectors, sum, 'v1'));
vectors.connect(output(vectors, b), input(vectors, sum, 'v2'));
vectors.connect(output(vectors, sum), input(vectors, scaled, 'vector'));
vectors.setInputValue(input(vectors, scaled, 'scalar'), scalar(2));

const engine = new EvaluationEngine({ debugMode: true });
const result = engine.evaluate(vectors, scaled);
if (result.success) {
  console.log(`Scaled sum: ${formatValue(result.value)}`);
  console.log(`Cached outputs: ${result.cache.size}`);
}

// CSV pipeline: LoadCSV -> SelectColumn -> SimpleFilter, plus CountRows
const csv = new NodeGraph('CSV pipeline');

const load = csv.addNode('LoadCSV');
const count = csv.addNode('CountRows');
const select = csv.addNode('SelectColumn');
const filter = csv.addNode('SimpleFilter');

csv.setInputValue(input(csv, load, 'path'), text(path.join(__dirname, 'data', 'measurements.csv')));
csv.connect(output(csv, load), input(csv, count, 'df'));
csv.connect(output(csv, load), input(csv, select, 'df'));
csv.setInputValue(input(csv, select, 'column'), text('temperature'));
csv.connect(output(csv, select), input(csv, filter, 'df'));
csv.setInputValue(input(csv, filter, 'min'), scalar(19));
csv.setInputValue(input(csv, filter, 'max'), scalar(22));

for (const node of [count, filter]) {
  console.log(inspectNode(csv, node)?.status);
}

const loadInspection = inspectNode(csv, load, { maxRows: 3 });
console.log('Preview:', loadInspection?.table);

const selectInspection = inspectNode(csv, select);
console.log('Plot:', selectInspection?.plot);

// Documents round-trip through JSON and MessagePack
const serializer = new GraphSerializer();
const json = serializer.serialize(csv, { format: GraphFormat.JSON, activeNode: filter });
const binary = serializer.serialize(csv, { format: GraphFormat.Binary, activeNode: filter });
console.log(`JSON document: ${json.size} bytes, binary document: ${binary.size} bytes`);

const restored = serializer.deserialize(binary.data);
console.log(`Restored '${restored.graph.name}' with ${restored.graph.nodeCount} nodes, active ${restored.activeNode}`);

console.log('Engine stats:', engine.getStats());
