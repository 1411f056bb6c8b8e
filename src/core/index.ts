/**
 * @module core
 *
 * IR 模型与通用形式打印器。
 *
 * 包含：
 * - 模型构造器 (Ir, Attr, Dim) 与位置区间 (Loc)
 * - Operation 构造器 (OperationBuilder, BuildSession)
 * - IR 遍历器 (DefaultIrVisitor, IrVisitor)
 * - 符号表收集 (collectSymbols)
 * - 文本渲染 (printModule, PrettyIrPrinter, renderType, renderAttr)
 * - 可选结构校验 (validateModule)
 */

export { Ir, Attr, Dim } from './ir.js';
export { Loc, comparePositions } from './location.js';
export { OperationBuilder, BuildSession, counterIdGenerator, resultName } from './builder.js';
export type { IdGenerator, BuildResult } from './builder.js';
export { DefaultIrVisitor, ENTRY_LABEL } from './visitor.js';
export type { IrVisitor } from './visitor.js';
export { collectSymbols, SYM_NAME } from './symbols.js';
export type { SymbolTable } from './symbols.js';
export { renderType, renderAttr, renderDim, formatFloat, formatInteger, escapeString } from './render.js';
export { printModule, PrettyIrPrinter, bindValues, MISSING_ATTR } from './pretty_ir.js';
export type { PrintOptions, TypeEnv } from './pretty_ir.js';
export { validateModule, hasErrors, checkDenseShape } from './validate.js';
