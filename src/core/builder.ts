/**
 * Operation 构造器。
 *
 * 标识符由调用方提供的纯函数生成：`(env) => [env', id]`。构造器每构建一个
 * Operation 恰好调用一次，返回的新环境是下一次构建的唯一合法输入。
 * 复用旧环境会产生重复标识符，但这里不做检测。
 */

import type { Ir, Location } from '../types.js';
import { Loc } from './location.js';

export type IdGenerator<Env> = (env: Env) => readonly [Env, string];

export interface BuildResult<Env> {
  readonly env: Env;
  readonly op: Ir.Operation;
}

interface OperationFields {
  readonly operands: readonly string[];
  readonly results: (id: string) => readonly Ir.Value[];
  readonly attrs: Ir.AttrDict;
  readonly regions: readonly Ir.Region[];
  readonly isTerminator: boolean;
  readonly loc: Location;
  readonly successors: readonly string[];
}

const DEFAULT_FIELDS: OperationFields = {
  operands: [],
  results: () => [],
  attrs: {},
  regions: [],
  isTerminator: false,
  loc: Loc.unknown(),
  successors: [],
};

/**
 * 以生成的标识符命名结果：单结果为 `%id`，多结果为 `%id#0`、`%id#1`…
 */
export function resultName(id: string, index: number, count: number): string {
  return count === 1 ? `%${id}` : `%${id}#${index}`;
}

/**
 * 不可变的 Operation 构造器。每个 setter 返回新实例；
 * 同一 setter 调用两次只保留最后一次的值。
 */
export class OperationBuilder<Env> {
  private constructor(
    readonly name: string,
    private readonly generateId: IdGenerator<Env>,
    private readonly fields: OperationFields
  ) {}

  static create<Env>(name: string, generateId: IdGenerator<Env>): OperationBuilder<Env> {
    return new OperationBuilder(name, generateId, DEFAULT_FIELDS);
  }

  private with(patch: Partial<OperationFields>): OperationBuilder<Env> {
    return new OperationBuilder(this.name, this.generateId, { ...this.fields, ...patch });
  }

  withOperands(operands: readonly string[]): OperationBuilder<Env> {
    return this.with({ operands });
  }

  withResults(results: readonly Ir.Value[]): OperationBuilder<Env> {
    return this.with({ results: () => results });
  }

  /** 仅给出结果类型，名称在 build 时由生成的标识符派生 */
  withResultTypes(types: readonly Ir.Type[]): OperationBuilder<Env> {
    return this.with({
      results: id => types.map((type, i) => ({ name: resultName(id, i, types.length), type })),
    });
  }

  withAttrs(attrs: Ir.AttrDict): OperationBuilder<Env> {
    return this.with({ attrs });
  }

  withRegions(regions: readonly Ir.Region[]): OperationBuilder<Env> {
    return this.with({ regions });
  }

  isTerminator(isTerminator = true): OperationBuilder<Env> {
    return this.with({ isTerminator });
  }

  withLoc(loc: Location): OperationBuilder<Env> {
    return this.with({ loc });
  }

  withSuccessors(successors: readonly string[]): OperationBuilder<Env> {
    return this.with({ successors });
  }

  /**
   * 调用一次标识符生成器并组装 Operation。不校验操作数、结果与属性的一致性。
   */
  build(env: Env): BuildResult<Env> {
    const [next, id] = this.generateId(env);
    const f = this.fields;
    return {
      env: next,
      op: {
        kind: 'Operation',
        name: this.name,
        id,
        operands: f.operands,
        results: f.results(id),
        attrs: f.attrs,
        regions: f.regions,
        isTerminator: f.isTerminator,
        loc: f.loc,
        successors: f.successors,
      },
    };
  }
}

/**
 * 单次构造会话：持有环境并在每次构建后推进，调用方不再手动传递环境。
 */
export class BuildSession<Env> {
  private current: Env;

  constructor(env: Env, private readonly generateId: IdGenerator<Env>) {
    this.current = env;
  }

  get env(): Env {
    return this.current;
  }

  operation(name: string): OperationBuilder<Env> {
    return OperationBuilder.create(name, this.generateId);
  }

  build(builder: OperationBuilder<Env>): Ir.Operation {
    const { env, op } = builder.build(this.current);
    this.current = env;
    return op;
  }
}

/**
 * 基于计数器的标识符生成器：`n => [n + 1, prefix + n]`。
 */
export function counterIdGenerator(prefix = ''): IdGenerator<number> {
  return n => [n + 1, `${prefix}${n}`];
}
