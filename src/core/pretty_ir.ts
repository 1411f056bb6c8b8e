import { performance } from 'node:perf_hooks';
import { ConfigService } from '../config/config-service.js';
import { DiagnosticError, DiagnosticSeverity } from '../diagnostics/diagnostics.js';
import type { Ir, Location } from '../types.js';
import { LogLevel, createLogger } from '../utils/logger.js';
import { Loc } from './location.js';
import { renderAttr, renderType, escapeString } from './render.js';
import { collectSymbols, type SymbolTable } from './symbols.js';
import { validateModule } from './validate.js';
import { ENTRY_LABEL } from './visitor.js';

const logger = createLogger('printer');

/** 属性键缺失时的占位文本 */
export const MISSING_ATTR = '<missing>';

/** 出现该键时属性字典以 `<{...}>`（properties）包裹 */
const PROPERTIES_KEY = 'callee';

export interface PrintOptions {
  /** 输出 ` loc(...)` 后缀；缺省取 ConfigService.printLocations */
  readonly printLocations?: boolean;
  /** 打印前执行 validateModule，遇到错误抛出 DiagnosticError；缺省取 ConfigService.validateOnPrint */
  readonly validate?: boolean;
}

/** SSA 名称 → 类型；只以函数式方式扩展，从不原地修改 */
export type TypeEnv = ReadonlyMap<string, Ir.Type>;

const EMPTY_ENV: TypeEnv = new Map();

export function bindValues(env: TypeEnv, values: readonly Ir.Value[]): TypeEnv {
  if (values.length === 0) return env;
  const next = new Map(env);
  for (const v of values) next.set(v.name, v.type);
  return next;
}

/**
 * 通用（generic）形式的 IR 打印器。
 *
 * 子类可覆写 `formatType` / `formatAttr` / `formatOperation` 等方法实现
 * 方言相关的渲染；`symbols` 在打印开始时收集完毕，供符号感知的变体使用。
 * 每个 format 方法返回自己的行，类型环境作为参数显式传递。
 */
export class PrettyIrPrinter {
  protected symbols: SymbolTable = new Map();

  constructor(protected readonly printLocations = false) {}

  get symbolTable(): SymbolTable {
    return this.symbols;
  }

  protected indent(n: number): string { return '  '.repeat(n); }

  formatModule(m: Ir.Module): string {
    this.symbols = collectSymbols(m);
    const lines = ['module {'];
    let env = EMPTY_ENV;
    for (const op of m.ops) {
      lines.push(...this.formatOperation(op, env, 1));
      env = bindValues(env, op.results);
    }
    lines.push('}');
    return `${lines.join('\n')}\n`;
  }

  protected formatOperation(op: Ir.Operation, env: TypeEnv, level: number): string[] {
    const ind = this.indent(level);
    const results = op.results.length ? `${op.results.map(r => r.name).join(', ')} = ` : '';
    const head = `${ind}${results}"${op.name}"(${op.operands.join(', ')})`;
    const lines: string[] = [];
    let last = head;
    if (op.regions.length) {
      lines.push(`${head} ({`);
      op.regions.forEach((region, i) => {
        if (i > 0) lines.push(`${ind}}, {`);
        lines.push(...this.formatRegion(region, level + 2));
      });
      last = `${ind}})`;
    }
    const signature = this.formatSignature(op, env);
    const successors = this.formatSuccessors(op.successors);
    lines.push(`${last}${this.formatAttrs(op.attrs)} : ${signature}${successors}${this.formatLocation(op.loc)}`);
    return lines;
  }

  protected formatRegion(r: Ir.Region, level: number): string[] {
    const lines = this.formatBlock(r.entry, ENTRY_LABEL, level, true);
    for (const [label, block] of r.blocks) lines.push(...this.formatBlock(block, label, level, false));
    return lines;
  }

  /**
   * 块头位于内容缩进的上一级；只有无参数的入口块省略块头，附加块即使
   * 标签与入口块相同也总是输出块头。每个块的类型环境只由自身参数开始。
   */
  protected formatBlock(b: Ir.Block, label: string, level: number, isEntry: boolean): string[] {
    const lines: string[] = [];
    if (!isEntry || b.args.length > 0) {
      const args = b.args.map(a => `${a.name}: ${this.formatType(a.type)}`).join(', ');
      lines.push(`${this.indent(level - 1)}^${label}(${args}):`);
    }
    let env = bindValues(EMPTY_ENV, b.args);
    for (const op of b.body) {
      lines.push(...this.formatOperation(op, env, level));
      env = bindValues(env, op.results);
    }
    lines.push(...this.formatOperation(b.terminator, env, level));
    return lines;
  }

  protected formatSignature(op: Ir.Operation, env: TypeEnv): string {
    const operandTypes = op.operands.map(name => {
      const type = env.get(name);
      return type ? this.formatType(type) : '';
    });
    const resultTypes = op.results.map(r => this.formatType(r.type));
    const [single] = resultTypes;
    const result = resultTypes.length === 1 && single !== undefined ? single : `(${resultTypes.join(', ')})`;
    return `(${operandTypes.join(', ')}) -> ${result}`;
  }

  protected formatAttrs(attrs: Ir.AttrDict): string {
    const keys = Object.keys(attrs).sort();
    if (keys.length === 0) return '';
    const body = keys
      .map(key => {
        const value: Ir.Attr | undefined = attrs[key];
        return `${key} = ${value ? this.formatAttr(value) : MISSING_ATTR}`;
      })
      .join(', ');
    return keys.includes(PROPERTIES_KEY) ? ` <{${body}}>` : ` {${body}}`;
  }

  protected formatSuccessors(successors: readonly string[]): string {
    if (successors.length === 0) return '';
    return ` [${successors.map(label => `^${label}`).join(' ')}]`;
  }

  /** 默认不输出位置信息 */
  protected formatLocation(loc: Location): string {
    if (!this.printLocations) return '';
    if (Loc.isUnknown(loc)) return ' loc(unknown)';
    return ` loc("${escapeString(loc.file)}":${loc.start.line}:${loc.start.col})`;
  }

  protected formatType(t: Ir.Type): string {
    return renderType(t);
  }

  protected formatAttr(a: Ir.Attr): string {
    return renderAttr(a);
  }
}

function countOperations(ops: readonly Ir.Operation[]): number {
  let count = 0;
  for (const op of ops) {
    count++;
    for (const region of op.regions) {
      for (const block of [region.entry, ...region.blocks.values()]) {
        count += countOperations([...block.body, block.terminator]);
      }
    }
  }
  return count;
}

/**
 * 将模块渲染为通用形式的文本。对任意输入都有定义；
 * 仅在显式要求校验且发现错误时抛出 DiagnosticError。
 */
export function printModule(m: Ir.Module, options: PrintOptions = {}): string {
  const config = ConfigService.getInstance();
  const printLocations = options.printLocations ?? config.printLocations;
  const validate = options.validate ?? config.validateOnPrint;

  if (validate) {
    const diagnostics = validateModule(m);
    const firstError = diagnostics.find(d => d.severity === DiagnosticSeverity.Error);
    for (const d of diagnostics) {
      if (d !== firstError) logger.warn(d.message, { code: d.code, severity: d.severity });
    }
    if (firstError) throw new DiagnosticError(firstError);
  }

  const started = performance.now();
  const printer = new PrettyIrPrinter(printLocations);
  const text = printer.formatModule(m);
  if (logger.isEnabled(LogLevel.DEBUG)) {
    logger.debug('module printed', {
      operations: countOperations(m.ops),
      symbols: printer.symbolTable.size,
      duration_ms: performance.now() - started,
    });
  }
  return text;
}
