/**
 * Node template catalog
 * 节点模板目录
 *
 * Declares every node kind available in the node finder together with the
 * ports a freshly created node of that kind receives.
 * 声明节点查找器中可用的每种节点类型，以及新建该类型节点时获得的端口。
 */

import type { DataType, Value } from '../values';
import { scalar, vector2, text, seriesValue, frameValue, emptySeries, emptyFrame } from '../values';

/**
 * Node kinds
 * 节点类型
 */
export type NodeKind =
  | 'MakeScalar'
  | 'AddScalar'
  | 'SubtractScalar'
  | 'MakeVector'
  | 'AddVector'
  | 'SubtractVector'
  | 'VectorTimesScalar'
  | 'LoadCSV'
  | 'CountRows'
  | 'SelectColumn'
  | 'SimpleFilter';

/**
 * How an input may receive its value
 * 输入获取值的方式
 */
export type InputParamKind =
  | 'connectionOnly'        // Only through a connection 仅通过连接
  | 'constantOnly'          // Only through the inline constant 仅通过内联常量
  | 'connectionOrConstant'; // Either 两者皆可

/**
 * Input port declaration
 * 输入端口声明
 */
export interface InputTemplate {
  name: string;
  type: DataType;
  kind: InputParamKind;
  shownInline: boolean;
}

/**
 * Output port declaration
 * 输出端口声明
 */
export interface OutputTemplate {
  name: string;
  type: DataType;
}

/**
 * Node kind declaration
 * 节点类型声明
 */
export interface NodeTemplate {
  /** Label in the node finder 节点查找器中的标签 */
  label: string;
  /** Finder categories 查找器分类 */
  categories: readonly string[];
  inputs: readonly InputTemplate[];
  outputs: readonly OutputTemplate[];
}

/**
 * Kinds in node finder order
 * 按节点查找器顺序排列的类型
 */
export const NODE_KINDS: readonly NodeKind[] = [
  'MakeScalar',
  'MakeVector',
  'AddScalar',
  'SubtractScalar',
  'AddVector',
  'SubtractVector',
  'VectorTimesScalar',
  'LoadCSV',
  'CountRows',
  'SelectColumn',
  'SimpleFilter'
];

const input = (name: string, type: DataType): InputTemplate => ({
  name,
  type,
  kind: 'connectionOrConstant',
  shownInline: true
});

const output = (name: string, type: DataType): OutputTemplate => ({ name, type });

export const NODE_TEMPLATES: { readonly [K in NodeKind]: NodeTemplate } = {
  MakeScalar: {
    label: 'New scalar',
    categories: ['Scalar'],
    inputs: [input('value', 'scalar')],
    outputs: [output('out', 'scalar')]
  },
  AddScalar: {
    label: 'Scalar add',
    categories: ['Scalar'],
    inputs: [input('A', 'scalar'), input('B', 'scalar')],
    outputs: [output('out', 'scalar')]
  },
  SubtractScalar: {
    label: 'Scalar subtract',
    categories: ['Scalar'],
    inputs: [input('A', 'scalar'), input('B', 'scalar')],
    outputs: [output('out', 'scalar')]
  },
  MakeVector: {
    label: 'New vector',
    categories: ['Vector'],
    inputs: [input('x', 'scalar'), input('y', 'scalar')],
    outputs: [output('out', 'vector2')]
  },
  AddVector: {
    label: 'Vector add',
    categories: ['Vector'],
    inputs: [input('v1', 'vector2'), input('v2', 'vector2')],
    outputs: [output('out', 'vector2')]
  },
  SubtractVector: {
    label: 'Vector subtract',
    categories: ['Vector'],
    inputs: [input('v1', 'vector2'), input('v2', 'vector2')],
    outputs: [output('out', 'vector2')]
  },
  VectorTimesScalar: {
    label: 'Vector times scalar',
    categories: ['Vector', 'Scalar'],
    inputs: [input('scalar', 'scalar'), input('vector', 'vector2')],
    outputs: [output('out', 'vector2')]
  },
  LoadCSV: {
    label: 'Load CSV',
    categories: ['Table', 'Scalar'],
    inputs: [input('path', 'text')],
    outputs: [output('out', 'frame')]
  },
  CountRows: {
    label: 'Count rows',
    categories: ['Table', 'Scalar'],
    inputs: [input('df', 'frame')],
    outputs: [output('out', 'scalar')]
  },
  SelectColumn: {
    label: 'Select column',
    categories: ['Table', 'Scalar'],
    inputs: [input('df', 'frame'), input('column', 'text')],
    outputs: [output('out', 'series')]
  },
  // The series input keeps the name "df" 序列输入保留名称"df"
  SimpleFilter: {
    label: 'Simple filter',
    categories: ['Table', 'Scalar'],
    inputs: [input('df', 'series'), input('min', 'scalar'), input('max', 'scalar')],
    outputs: [output('out', 'series')]
  }
};

export function isNodeKind(value: string): value is NodeKind {
  return Object.prototype.hasOwnProperty.call(NODE_TEMPLATES, value);
}

export function getNodeTemplate(kind: NodeKind): NodeTemplate {
  return NODE_TEMPLATES[kind];
}

/**
 * Constant stored in a new input of the given type
 * 给定类型的新输入中存储的常量
 */
export function defaultValueFor(type: DataType): Value {
  switch (type) {
    case 'scalar':
      return scalar(0);
    case 'vector2':
      return vector2(0, 0);
    case 'text':
      return text('');
    case 'series':
      return seriesValue(emptySeries());
    case 'frame':
      return frameValue(emptyFrame());
  }
}

/**
 * Group kinds by finder category; a kind appears under each of its categories
 * 按查找器分类对类型分组；类型出现在其每个分类下
 */
export function kindsByCategory(): Map<string, NodeKind[]> {
  const groups = new Map<string, NodeKind[]>();
  for (const kind of NODE_KINDS) {
    for (const category of NODE_TEMPLATES[kind].categories) {
      const group = groups.get(category);
      if (group) {
        group.push(kind);
      } else {
        groups.set(category, [kind]);
      }
    }
  }
  return groups;
}

export function isInputParamKind(value: string): value is InputParamKind {
  return value === 'connectionOnly' || value === 'constantOnly' || value === 'connectionOrConstant';
}
