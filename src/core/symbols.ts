import type { Ir } from '../types.js';
import { DefaultIrVisitor } from './visitor.js';

export type SymbolTable = ReadonlyMap<string, Ir.Operation>;

/** 符号定义属性名 */
export const SYM_NAME = 'sym_name';

class SymbolCollector extends DefaultIrVisitor {
  readonly symbols = new Map<string, Ir.Operation>();

  override visitOperation(op: Ir.Operation): void {
    const sym = op.attrs[SYM_NAME];
    // 同名符号后者覆盖前者；重复定义由 validateModule 报告
    if (sym?.kind === 'String') this.symbols.set(sym.value, op);
    super.visitOperation(op);
  }
}

/**
 * 深度优先收集模块中所有带 `sym_name` 字符串属性的操作，
 * 包括嵌套区域中的块体与终结符。
 */
export function collectSymbols(m: Ir.Module): SymbolTable {
  const collector = new SymbolCollector();
  collector.visitModule(m);
  return collector.symbols;
}
