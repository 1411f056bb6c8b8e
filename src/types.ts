// Core type definitions for the IR model

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/**
 * 文件 + 起止位置。附着在 Operation / Module 上，默认打印路径不输出。
 */
export interface Location extends Span {
  readonly file: string;
}

/**
 * IR 数据模型（纯数据，无行为）。
 *
 * 所有节点均为只读结构：构造完成后不再修改，可被任意多个读者共享。
 */
export namespace Ir {
  // ============================================================
  // 维度与类型
  // ============================================================

  export interface StaticDim {
    readonly kind: 'Static';
    readonly extent: number;
  }

  export interface DynamicDim {
    readonly kind: 'Dynamic';
  }

  export type Dim = StaticDim | DynamicDim;

  export type IntegerWidth = 1 | 8 | 16 | 32 | 64;
  export type FloatWidth = 32 | 64;

  export interface IntegerType {
    readonly kind: 'Integer';
    readonly width: IntegerWidth;
  }

  export interface FloatType {
    readonly kind: 'Float';
    readonly width: FloatWidth;
  }

  export interface IndexType {
    readonly kind: 'Index';
  }

  export interface MemRefType {
    readonly kind: 'MemRef';
    readonly dims: readonly Dim[];
    readonly element: Type;
  }

  export interface StructType {
    readonly kind: 'Struct';
    readonly fields: readonly Type[];
  }

  /** 命名的不透明类型，打印为 `!Name` */
  export interface NamedType {
    readonly kind: 'Named';
    readonly name: string;
  }

  export interface FunctionType {
    readonly kind: 'Function';
    readonly inputs: readonly Type[];
    readonly results: readonly Type[];
  }

  export interface RankedTensorType {
    readonly kind: 'RankedTensor';
    readonly dims: readonly Dim[];
    readonly element: Type;
  }

  export interface UnrankedTensorType {
    readonly kind: 'UnrankedTensor';
    readonly element: Type;
  }

  export type Type =
    | IntegerType
    | FloatType
    | IndexType
    | MemRefType
    | StructType
    | NamedType
    | FunctionType
    | RankedTensorType
    | UnrankedTensorType;

  // ============================================================
  // 属性
  // ============================================================

  export interface StringAttr {
    readonly kind: 'String';
    readonly value: string;
  }

  export interface BoolAttr {
    readonly kind: 'Bool';
    readonly value: boolean;
  }

  export interface IntAttr {
    readonly kind: 'Int';
    readonly type: Type | null;
    readonly value: number | bigint;
  }

  export interface FloatAttr {
    readonly kind: 'Float';
    readonly type: Type | null;
    readonly value: number;
  }

  export interface TypeAttr {
    readonly kind: 'Type';
    readonly type: Type;
  }

  export interface ArrayAttr {
    readonly kind: 'Array';
    readonly elementType: Type | null;
    readonly elements: readonly Attr[];
  }

  /** 稠密张量字面量的载荷：标量或任意嵌套的聚合 */
  export type DenseElement = number | readonly DenseElement[];

  /**
   * 稠密浮点字面量。shape 与 payload 的一致性不由模型保证，
   * 打印器按原样输出；可选的校验见 `validateModule`。
   */
  export interface DenseAttr {
    readonly kind: 'Dense';
    readonly shape: readonly Dim[];
    readonly elementType: FloatType;
    readonly payload: DenseElement;
  }

  export interface SymbolRefAttr {
    readonly kind: 'SymbolRef';
    readonly name: string;
  }

  export type Visibility = 'public' | 'private' | 'nested';

  export interface VisibilityAttr {
    readonly kind: 'Visibility';
    readonly visibility: Visibility;
  }

  export interface UnitAttr {
    readonly kind: 'Unit';
  }

  export type Attr =
    | StringAttr
    | BoolAttr
    | IntAttr
    | FloatAttr
    | TypeAttr
    | ArrayAttr
    | DenseAttr
    | SymbolRefAttr
    | VisibilityAttr
    | UnitAttr;

  /** 属性名 → 属性值；键唯一，打印时按字典序排序 */
  export type AttrDict = Readonly<Record<string, Attr>>;

  // ============================================================
  // 结构
  // ============================================================

  /** (名称, 类型) 对：用于结果声明与块参数 */
  export interface Value {
    readonly name: string;
    readonly type: Type;
  }

  export interface Operation {
    readonly kind: 'Operation';
    /** 带方言前缀的名称，如 `arith.constant` */
    readonly name: string;
    readonly id: string;
    readonly operands: readonly string[];
    readonly results: readonly Value[];
    readonly attrs: AttrDict;
    readonly regions: readonly Region[];
    readonly isTerminator: boolean;
    readonly loc: Location;
    readonly successors: readonly string[];
  }

  export interface Block {
    readonly kind: 'Block';
    readonly args: readonly Value[];
    readonly body: readonly Operation[];
    readonly terminator: Operation;
  }

  /**
   * 入口块隐式标记为 `bb0`；其余块按声明顺序保存在 `blocks` 中。
   */
  export interface Region {
    readonly kind: 'Region';
    readonly entry: Block;
    readonly blocks: ReadonlyMap<string, Block>;
  }

  export interface Module {
    readonly kind: 'Module';
    readonly ops: readonly Operation[];
    readonly loc: Location;
  }
}
