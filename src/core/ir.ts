// IR 模型构造器（纯数据，无校验）

import type { Ir as IrTypes, Location } from '../types.js';
import { Loc } from './location.js';

export const Dim = {
  static: (extent: number): IrTypes.StaticDim => ({ kind: 'Static', extent }),
  dynamic: (): IrTypes.DynamicDim => ({ kind: 'Dynamic' }),
  /** 便捷写法：数字为静态维度，`'?'` 为动态维度 */
  of: (dims: readonly (number | '?')[]): IrTypes.Dim[] =>
    dims.map((d): IrTypes.Dim => (d === '?' ? { kind: 'Dynamic' } : { kind: 'Static', extent: d })),
};

export const Ir = {
  // Types
  I1: { kind: 'Integer', width: 1 } as const satisfies IrTypes.IntegerType,
  I8: { kind: 'Integer', width: 8 } as const satisfies IrTypes.IntegerType,
  I16: { kind: 'Integer', width: 16 } as const satisfies IrTypes.IntegerType,
  I32: { kind: 'Integer', width: 32 } as const satisfies IrTypes.IntegerType,
  I64: { kind: 'Integer', width: 64 } as const satisfies IrTypes.IntegerType,
  F32: { kind: 'Float', width: 32 } as const satisfies IrTypes.FloatType,
  F64: { kind: 'Float', width: 64 } as const satisfies IrTypes.FloatType,
  Index: { kind: 'Index' } as const satisfies IrTypes.IndexType,

  Integer: (width: IrTypes.IntegerWidth): IrTypes.IntegerType => ({ kind: 'Integer', width }),
  Float: (width: IrTypes.FloatWidth): IrTypes.FloatType => ({ kind: 'Float', width }),
  MemRef: (dims: readonly IrTypes.Dim[], element: IrTypes.Type): IrTypes.MemRefType => ({
    kind: 'MemRef',
    dims,
    element,
  }),
  Struct: (fields: readonly IrTypes.Type[]): IrTypes.StructType => ({ kind: 'Struct', fields }),
  Named: (name: string): IrTypes.NamedType => ({ kind: 'Named', name }),
  Function: (
    inputs: readonly IrTypes.Type[],
    results: readonly IrTypes.Type[]
  ): IrTypes.FunctionType => ({ kind: 'Function', inputs, results }),
  Tensor: (dims: readonly IrTypes.Dim[], element: IrTypes.Type): IrTypes.RankedTensorType => ({
    kind: 'RankedTensor',
    dims,
    element,
  }),
  UnrankedTensor: (element: IrTypes.Type): IrTypes.UnrankedTensorType => ({
    kind: 'UnrankedTensor',
    element,
  }),

  // Structure
  Value: (name: string, type: IrTypes.Type): IrTypes.Value => ({ name, type }),
  Block: (
    args: readonly IrTypes.Value[],
    body: readonly IrTypes.Operation[],
    terminator: IrTypes.Operation
  ): IrTypes.Block => ({ kind: 'Block', args, body, terminator }),
  Region: (
    entry: IrTypes.Block,
    blocks: Iterable<readonly [string, IrTypes.Block]> = []
  ): IrTypes.Region => ({ kind: 'Region', entry, blocks: new Map(blocks) }),
  Module: (ops: readonly IrTypes.Operation[], loc: Location = Loc.unknown()): IrTypes.Module => ({
    kind: 'Module',
    ops,
    loc,
  }),
};

export const Attr = {
  String: (value: string): IrTypes.StringAttr => ({ kind: 'String', value }),
  Bool: (value: boolean): IrTypes.BoolAttr => ({ kind: 'Bool', value }),
  Int: (type: IrTypes.Type | null, value: number | bigint): IrTypes.IntAttr => ({
    kind: 'Int',
    type,
    value,
  }),
  Float: (type: IrTypes.Type | null, value: number): IrTypes.FloatAttr => ({
    kind: 'Float',
    type,
    value,
  }),
  Type: (type: IrTypes.Type): IrTypes.TypeAttr => ({ kind: 'Type', type }),
  Array: (
    elements: readonly IrTypes.Attr[],
    elementType: IrTypes.Type | null = null
  ): IrTypes.ArrayAttr => ({ kind: 'Array', elementType, elements }),
  Dense: (
    shape: readonly IrTypes.Dim[],
    payload: IrTypes.DenseElement,
    elementType: IrTypes.FloatType = Ir.F64
  ): IrTypes.DenseAttr => ({ kind: 'Dense', shape, elementType, payload }),
  SymbolRef: (name: string): IrTypes.SymbolRefAttr => ({ kind: 'SymbolRef', name }),
  Visibility: (visibility: IrTypes.Visibility): IrTypes.VisibilityAttr => ({
    kind: 'Visibility',
    visibility,
  }),
  Unit: (): IrTypes.UnitAttr => ({ kind: 'Unit' }),
};
