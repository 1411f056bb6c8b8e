import type { Ir } from '../types.js';

/**
 * 统一的 IR 遍历器接口与默认实现。
 *
 * - 默认实现执行深度优先遍历：块体在前，终结符在后
 * - 具体阶段按需覆写感兴趣的节点方法，调用 `super.visitXxx` 继续默认递归
 * - `Ctx` 由子类决定（类型环境、区域栈等）；不需要上下文的遍历使用默认的 `void`
 */

export interface IrVisitor<Ctx, R = void> {
  visitModule(m: Ir.Module, ctx: Ctx): R;
  visitOperation(op: Ir.Operation, ctx: Ctx): R;
  visitRegion(r: Ir.Region, ctx: Ctx): R;
  visitBlock(b: Ir.Block, label: string, ctx: Ctx): R;
  visitAttr?(name: string, a: Ir.Attr, ctx: Ctx): R;
  visitType?(t: Ir.Type, ctx: Ctx): R;
}

/** 区域入口块的隐式标签 */
export const ENTRY_LABEL = 'bb0';

/**
 * 默认的 IR 递归遍历器。
 */
export class DefaultIrVisitor<Ctx = void> implements IrVisitor<Ctx, void> {
  // 可选钩子默认不实现，由子类按需覆写
  public visitAttr?(name: string, a: Ir.Attr, ctx: Ctx): void;
  public visitType?(t: Ir.Type, ctx: Ctx): void;

  visitModule(m: Ir.Module, ctx: Ctx): void {
    for (const op of m.ops) this.visitOperation(op, ctx);
  }

  visitOperation(op: Ir.Operation, ctx: Ctx): void {
    for (const [name, attr] of Object.entries(op.attrs)) this.visitAttr?.(name, attr, ctx);
    for (const r of op.results) this.visitType?.(r.type, ctx);
    for (const region of op.regions) this.visitRegion(region, ctx);
  }

  visitRegion(r: Ir.Region, ctx: Ctx): void {
    this.visitBlock(r.entry, ENTRY_LABEL, ctx);
    for (const [label, block] of r.blocks) this.visitBlock(block, label, ctx);
  }

  visitBlock(b: Ir.Block, _label: string, ctx: Ctx): void {
    for (const arg of b.args) this.visitType?.(arg.type, ctx);
    for (const op of b.body) this.visitOperation(op, ctx);
    this.visitOperation(b.terminator, ctx);
  }
}
