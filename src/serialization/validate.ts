/**
 * Graph document validation
 * 图文档验证
 *
 * Turns untrusted parsed data into a typed GraphDocument, building every
 * value afresh instead of trusting its shape.
 * 将不可信的解析数据转换为类型化的GraphDocument，重新构建每个值而不是信任其结构。
 */

import { GraphDocumentError } from '../errors';
import type { Series, Value } from '../values';
import { createFrame, isDataType } from '../values';
import { getNodeTemplate, isInputParamKind, isNodeKind } from '../templates';
import type { InputId, NodeId, OutputId } from '../graph/types';
import { isInputId, isNodeId, isOutputId } from '../graph/types';
import type { GraphDocument, InputPortRecord, NodeRecord, OutputPortRecord } from './types';
import { GRAPH_DOCUMENT_VERSION } from './types';

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === 'object' && !Array.isArray(v);
}

function fail(where: string, message: string): never {
  throw new GraphDocumentError(`${where}: ${message}`);
}

function expectObject(v: unknown, where: string): Record<string, unknown> {
  if (!isPlainObject(v)) fail(where, 'expected an object');
  return v;
}

function expectArray(v: unknown, where: string): unknown[] {
  if (!Array.isArray(v)) fail(where, 'expected an array');
  return v;
}

function expectString(v: unknown, where: string): string {
  if (typeof v !== 'string') fail(where, 'expected a string');
  return v;
}

function expectNumber(v: unknown, where: string): number {
  if (typeof v !== 'number') fail(where, 'expected a number');
  return v;
}

function expectBoolean(v: unknown, where: string): boolean {
  if (typeof v !== 'boolean') fail(where, 'expected a boolean');
  return v;
}

function expectNodeId(v: unknown, where: string): NodeId {
  const id = expectString(v, where);
  if (!isNodeId(id)) fail(where, `invalid node id '${id}'`);
  return id;
}

function expectInputId(v: unknown, where: string): InputId {
  const id = expectString(v, where);
  if (!isInputId(id)) fail(where, `invalid input id '${id}'`);
  return id;
}

function expectOutputId(v: unknown, where: string): OutputId {
  const id = expectString(v, where);
  if (!isOutputId(id)) fail(where, `invalid output id '${id}'`);
  return id;
}

function validateSeries(v: unknown, where: string): Series {
  const raw = expectObject(v, where);
  const name = expectString(raw.name, `${where}.name`);
  const values = expectArray(raw.values, `${where}.values`);
  const dtype = raw.dtype;

  switch (dtype) {
    case 'float64':
    case 'int64':
      return {
        name,
        dtype,
        values: values.map((entry, i) => (entry === null ? null : expectNumber(entry, `${where}.values[${i}]`)))
      };
    case 'utf8':
      return {
        name,
        dtype: 'utf8',
        values: values.map((entry, i) => (entry === null ? null : expectString(entry, `${where}.values[${i}]`)))
      };
    default:
      return fail(`${where}.dtype`, `unknown series dtype ${JSON.stringify(dtype)}`);
  }
}

/**
 * Validate a tagged value
 * 验证带标签的值
 */
export function validateValue(v: unknown, where: string): Value {
  const raw = expectObject(v, where);

  switch (raw.type) {
    case 'scalar':
      return { type: 'scalar', value: expectNumber(raw.value, `${where}.value`) };
    case 'vector2': {
      const vec = expectObject(raw.value, `${where}.value`);
      return {
        type: 'vector2',
        value: { x: expectNumber(vec.x, `${where}.value.x`), y: expectNumber(vec.y, `${where}.value.y`) }
      };
    }
    case 'text':
      return { type: 'text', value: expectString(raw.value, `${where}.value`) };
    case 'series':
      return { type: 'series', value: validateSeries(raw.value, `${where}.value`) };
    case 'frame': {
      const frame = expectObject(raw.value, `${where}.value`);
      const columns = expectArray(frame.columns, `${where}.value.columns`)
        .map((column, i) => validateSeries(column, `${where}.value.columns[${i}]`));
      try {
        return { type: 'frame', value: createFrame(columns) };
      } catch (error) {
        return fail(`${where}.value`, error instanceof Error ? error.message : String(error));
      }
    }
    default:
      return fail(`${where}.type`, `unknown value type ${JSON.stringify(raw.type)}`);
  }
}

function validateInput(v: unknown, where: string): InputPortRecord {
  const raw = expectObject(v, where);
  const type = expectString(raw.type, `${where}.type`);
  const kind = expectString(raw.kind, `${where}.kind`);
  if (!isDataType(type)) fail(`${where}.type`, `unknown data type '${type}'`);
  if (!isInputParamKind(kind)) fail(`${where}.kind`, `unknown input kind '${kind}'`);

  return {
    id: expectInputId(raw.id, `${where}.id`),
    name: expectString(raw.name, `${where}.name`),
    type,
    kind,
    shownInline: expectBoolean(raw.shownInline, `${where}.shownInline`),
    value: validateValue(raw.value, `${where}.value`)
  };
}

function validateOutput(v: unknown, where: string): OutputPortRecord {
  const raw = expectObject(v, where);
  const type = expectString(raw.type, `${where}.type`);
  if (!isDataType(type)) fail(`${where}.type`, `unknown data type '${type}'`);

  return {
    id: expectOutputId(raw.id, `${where}.id`),
    name: expectString(raw.name, `${where}.name`),
    type
  };
}

function describePorts(ports: readonly { name: string; type: string }[]): string {
  return ports.length === 0 ? '(none)' : ports.map(port => `${port.name}: ${port.type}`).join(', ');
}

/**
 * Ports must repeat the kind's declaration in order
 * 端口必须按顺序与节点类型的声明一致
 */
function expectTemplatePorts(
  ports: readonly { name: string; type: string }[],
  declared: readonly { name: string; type: string }[],
  kind: string,
  where: string
): void {
  const matches = ports.length === declared.length &&
    ports.every((port, i) => port.name === declared[i].name && port.type === declared[i].type);
  if (!matches) {
    fail(where, `ports [${describePorts(ports)}] do not match ${kind} [${describePorts(declared)}]`);
  }
}

function validateNode(v: unknown, where: string): NodeRecord {
  const raw = expectObject(v, where);
  const kind = expectString(raw.kind, `${where}.kind`);
  if (!isNodeKind(kind)) fail(`${where}.kind`, `unknown node kind '${kind}'`);

  const inputs = expectArray(raw.inputs, `${where}.inputs`).map((port, i) => validateInput(port, `${where}.inputs[${i}]`));
  const outputs = expectArray(raw.outputs, `${where}.outputs`).map((port, i) => validateOutput(port, `${where}.outputs[${i}]`));
  const template = getNodeTemplate(kind);
  expectTemplatePorts(inputs, template.inputs, kind, `${where}.inputs`);
  expectTemplatePorts(outputs, template.outputs, kind, `${where}.outputs`);

  return {
    id: expectNodeId(raw.id, `${where}.id`),
    kind,
    label: expectString(raw.label, `${where}.label`),
    inputs,
    outputs
  };
}

/**
 * Validate parsed data as a graph document
 * 将解析后的数据验证为图文档
 *
 * @throws GraphDocumentError naming the first offending path 抛出错误并指出第一个出错的路径
 */
export function validateGraphDocument(data: unknown): GraphDocument {
  const raw = expectObject(data, 'document');

  const version = expectNumber(raw.version, 'document.version');
  if (!Number.isInteger(version) || version < 1 || version > GRAPH_DOCUMENT_VERSION) {
    fail('document.version', `unsupported version ${version}`);
  }

  const connections = expectArray(raw.connections, 'document.connections').map((pair, i): [OutputId, InputId] => {
    const where = `document.connections[${i}]`;
    const entry = expectArray(pair, where);
    if (entry.length !== 2) fail(where, 'expected an [output, input] pair');
    return [expectOutputId(entry[0], `${where}[0]`), expectInputId(entry[1], `${where}[1]`)];
  });

  return {
    version,
    name: expectString(raw.name, 'document.name'),
    nextId: expectNumber(raw.nextId, 'document.nextId'),
    nodes: expectArray(raw.nodes, 'document.nodes').map((node, i) => validateNode(node, `document.nodes[${i}]`)),
    connections,
    activeNode: raw.activeNode === null || raw.activeNode === undefined
      ? null
      : expectNodeId(raw.activeNode, 'document.activeNode')
  };
}
