/**
 * 测试数据工厂
 * 用于直接构造 IR 节点（不经过 OperationBuilder）
 */

import { Ir as IrCtor } from '../../src/core/ir.js';
import { Loc } from '../../src/core/location.js';
import type { Ir } from '../../src/types.js';

type OperationOverrides = Partial<Omit<Ir.Operation, 'kind' | 'name'>>;

export const TestFactories = {
  /**
   * 创建 Operation，未给出的字段取构造器默认值
   */
  op(name: string, overrides: OperationOverrides = {}): Ir.Operation {
    return {
      kind: 'Operation',
      name,
      id: overrides.id ?? name,
      operands: overrides.operands ?? [],
      results: overrides.results ?? [],
      attrs: overrides.attrs ?? {},
      regions: overrides.regions ?? [],
      isTerminator: overrides.isTerminator ?? false,
      loc: overrides.loc ?? Loc.unknown(),
      successors: overrides.successors ?? [],
    };
  },

  /**
   * 创建终结符 Operation
   */
  terminator(name: string, overrides: OperationOverrides = {}): Ir.Operation {
    return TestFactories.op(name, { ...overrides, isTerminator: true });
  },

  /**
   * 创建仅含入口块的区域
   */
  singleBlockRegion(
    body: readonly Ir.Operation[],
    terminator: Ir.Operation,
    args: readonly Ir.Value[] = []
  ): Ir.Region {
    return IrCtor.Region(IrCtor.Block(args, body, terminator));
  },

  module(ops: readonly Ir.Operation[]): Ir.Module {
    return IrCtor.Module(ops);
  },
};
