// 类型与属性的文本渲染（纯函数，对全部变体有定义）

import type { Ir } from '../types.js';

export function renderDim(d: Ir.Dim): string {
  return d.kind === 'Static' ? String(d.extent) : '*';
}

function renderShaped(dims: readonly Ir.Dim[], element: Ir.Type): string {
  return [...dims.map(renderDim), renderType(element)].join('x');
}

function renderTypeList(types: readonly Ir.Type[]): string {
  return types.map(renderType).join(', ');
}

export function renderType(t: Ir.Type): string {
  switch (t.kind) {
    case 'Integer': return `i${t.width}`;
    case 'Float': return `f${t.width}`;
    case 'Index': return 'index';
    case 'MemRef': return `memref<${renderShaped(t.dims, t.element)}>`;
    case 'Struct': return `struct<${renderTypeList(t.fields)}>`;
    case 'Named': return `!${t.name}`;
    case 'Function': return `(${renderTypeList(t.inputs)}) -> (${renderTypeList(t.results)})`;
    case 'RankedTensor': return `tensor<${renderShaped(t.dims, t.element)}>`;
    case 'UnrankedTensor': return `tensor<*x${renderType(t.element)}>`;
    default: {
      const _exhaustiveCheck: never = t;
      return _exhaustiveCheck;
    }
  }
}

/**
 * 固定 6 位小数；负号单独输出，因此 `-0` 渲染为 `-0.000000`。
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  const negative = value < 0 || Object.is(value, -0);
  const magnitude = Math.abs(value);
  let digits: string;
  if (!Number.isFinite(magnitude)) digits = 'inf';
  // toFixed 在 1e21 以上退化为指数形式；此范围内的 double 都是整数
  else if (magnitude >= 1e21) digits = `${BigInt(magnitude)}.000000`;
  else digits = magnitude.toFixed(6);
  return negative ? `-${digits}` : digits;
}

/** 十进制整数；`number` 在 1e21 以上时 String() 会退化为指数形式 */
export function formatInteger(value: number | bigint): string {
  if (typeof value === 'bigint' || !Number.isInteger(value)) return String(value);
  return BigInt(value).toString();
}

export function escapeString(value: string): string {
  return value
    .replace(/["\\]/g, ch => `\\${ch}`)
    .replace(/[\u0000-\u001f\u007f]/g, ch => `\\${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`);
}

export function renderDensePayload(payload: Ir.DenseElement): string {
  if (typeof payload === 'number') return formatFloat(payload);
  return `[${payload.map(renderDensePayload).join(', ')}]`;
}

function typedSuffix(type: Ir.Type | null): string {
  return type ? ` : ${renderType(type)}` : '';
}

export function renderAttr(a: Ir.Attr): string {
  switch (a.kind) {
    case 'String': return `"${escapeString(a.value)}"`;
    case 'Bool': return a.value ? 'true' : 'false';
    case 'Int': return `${formatInteger(a.value)}${typedSuffix(a.type)}`;
    case 'Float': return `${formatFloat(a.value)}${typedSuffix(a.type)}`;
    case 'Type': return renderType(a.type);
    case 'Array': {
      const elements = a.elements.map(renderAttr).join(', ');
      if (!a.elementType) return `[${elements}]`;
      const elementType = renderType(a.elementType);
      return a.elements.length ? `array<${elementType}: ${elements}>` : `array<${elementType}>`;
    }
    case 'Dense': {
      const type = `tensor<${renderShaped(a.shape, a.elementType)}>`;
      return `dense<${renderDensePayload(a.payload)}> : ${type}`;
    }
    case 'SymbolRef': return `@${a.name}`;
    case 'Visibility': return `"${a.visibility}"`;
    case 'Unit': return 'unit';
    default: {
      const _exhaustiveCheck: never = a;
      return _exhaustiveCheck;
    }
  }
}
