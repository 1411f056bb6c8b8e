/**
 * 可选的结构校验（不参与默认打印路径）。
 *
 * 作用域规则与打印器一致：每个块只看到自己的参数与块内此前操作的结果，
 * 绑定不跨越块或区域边界。
 */

import type { Ir, Location } from '../types.js';
import { Diagnostics, DiagnosticSeverity, type Diagnostic } from '../diagnostics/diagnostics.js';
import { renderDim } from './render.js';
import { SYM_NAME } from './symbols.js';
import { DefaultIrVisitor, ENTRY_LABEL } from './visitor.js';

interface ValidationContext {
  /** 由外到内的区域栈，用于解析后继块标签 */
  readonly regions: Ir.Region[];
}

/**
 * 检查稠密字面量的嵌套结构是否与静态形状一致；动态维度只检查嵌套层数。
 *
 * @returns 不一致时的描述，一致时返回 null
 */
export function checkDenseShape(shape: readonly Ir.Dim[], payload: Ir.DenseElement): string | null {
  const [dim, ...rest] = shape;
  if (!dim) {
    return typeof payload === 'number' ? null : 'expected a scalar at innermost level';
  }
  if (typeof payload === 'number') {
    // 标量载荷表示以单值填充（splat）
    return null;
  }
  if (dim.kind === 'Static' && payload.length !== dim.extent) {
    return `expected ${dim.extent} elements, found ${payload.length}`;
  }
  for (const element of payload) {
    if (typeof element === 'number' && rest.length > 0) {
      return `expected ${rest.length} more nested level(s) for shape ${shape.map(renderDim).join('x')}`;
    }
    const problem = checkDenseShape(rest, element);
    if (problem) return problem;
  }
  return null;
}

class ModuleValidator extends DefaultIrVisitor<ValidationContext> {
  readonly diagnostics: Diagnostic[] = [];
  private readonly symbols = new Map<string, Location>();

  override visitOperation(op: Ir.Operation, ctx: ValidationContext): void {
    this.checkSuccessors(op, ctx);
    this.checkAttrs(op);
    super.visitOperation(op, ctx);
  }

  override visitRegion(r: Ir.Region, ctx: ValidationContext): void {
    const shadowing = r.blocks.get(ENTRY_LABEL);
    if (shadowing) {
      const loc = shadowing.body[0]?.loc ?? shadowing.terminator.loc;
      this.report(Diagnostics.reservedEntryLabel(ENTRY_LABEL, loc).build());
    }
    ctx.regions.push(r);
    super.visitRegion(r, ctx);
    ctx.regions.pop();
  }

  override visitModule(m: Ir.Module, ctx: ValidationContext): void {
    this.checkSequence(m.ops, new Set(), ctx);
  }

  override visitBlock(b: Ir.Block, _label: string, ctx: ValidationContext): void {
    const bound = new Set<string>();
    this.bind(bound, b.args, b.body[0]?.loc ?? b.terminator.loc);
    for (const op of b.body) {
      if (op.isTerminator) this.report(Diagnostics.terminatorInBody(op.name, op.loc).build());
    }
    this.checkSequence(b.body, bound, ctx);
    this.checkOperands(b.terminator, bound);
    if (!b.terminator.isTerminator) {
      this.report(Diagnostics.terminatorNotMarked(b.terminator.name, b.terminator.loc).build());
    }
    this.visitOperation(b.terminator, ctx);
  }

  /** 按声明顺序检查操作数，并在每个操作之后绑定其结果 */
  private checkSequence(ops: readonly Ir.Operation[], bound: Set<string>, ctx: ValidationContext): void {
    for (const op of ops) {
      this.checkOperands(op, bound);
      this.visitOperation(op, ctx);
      this.bind(bound, op.results, op.loc);
    }
  }

  private checkOperands(op: Ir.Operation, bound: ReadonlySet<string>): void {
    for (const operand of op.operands) {
      if (!bound.has(operand)) {
        this.report(Diagnostics.unresolvedOperand(operand, op.name, op.loc).build());
      }
    }
  }

  private bind(bound: Set<string>, values: readonly Ir.Value[], loc: Location): void {
    for (const v of values) {
      if (bound.has(v.name)) this.report(Diagnostics.duplicateValue(v.name, loc).build());
      bound.add(v.name);
    }
  }

  private checkSuccessors(op: Ir.Operation, ctx: ValidationContext): void {
    if (op.successors.length === 0) return;
    const region = ctx.regions[ctx.regions.length - 1];
    for (const label of op.successors) {
      const known = label === ENTRY_LABEL || (region?.blocks.has(label) ?? false);
      if (!known) this.report(Diagnostics.unknownSuccessor(label, op.name, op.loc).build());
    }
  }

  private checkAttrs(op: Ir.Operation): void {
    for (const [name, attr] of Object.entries(op.attrs)) {
      if (attr.kind === 'Dense') {
        const problem = checkDenseShape(attr.shape, attr.payload);
        if (problem) this.report(Diagnostics.denseShapeMismatch(name, problem, op.loc).build());
      }
      if (name === SYM_NAME && attr.kind === 'String') {
        const previous = this.symbols.get(attr.value);
        if (previous) {
          this.report(Diagnostics.duplicateSymbol(attr.value, op.loc, previous).build());
        } else {
          this.symbols.set(attr.value, op.loc);
        }
      }
    }
  }

  private report(d: Diagnostic): void {
    this.diagnostics.push(d);
  }
}

/**
 * 校验模块结构，返回按遍历顺序排列的诊断（块体先于终结符）。
 */
export function validateModule(m: Ir.Module): Diagnostic[] {
  const validator = new ModuleValidator();
  validator.visitModule(m, { regions: [] });
  return validator.diagnostics;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === DiagnosticSeverity.Error);
}
