import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { Attr, Ir } from '../../src/core/ir.js';
import { Loc, comparePositions } from '../../src/core/location.js';
import { printModule } from '../../src/core/pretty_ir.js';
import { formatFloat } from '../../src/core/render.js';
import type { Ir as IrTypes, Location } from '../../src/types.js';
import { TestFactories } from '../helpers/test-factories.js';

const attrKey = fc.stringMatching(/^[a-z_]{1,8}$/);

const scalarAttr: fc.Arbitrary<IrTypes.Attr> = fc.oneof(
  fc.string({ maxLength: 10 }).map(s => Attr.String(s)),
  fc.boolean().map(b => Attr.Bool(b)),
  fc.integer().map(n => Attr.Int(null, n)),
  fc.double({ noNaN: true }).map(x => Attr.Float(Ir.F64, x)),
  fc.constant(Attr.Unit())
);

const location: fc.Arbitrary<Location> = fc
  .tuple(fc.nat(500), fc.nat(80), fc.nat(500), fc.nat(80))
  .map(([l1, c1, l2, c2]) => Loc.make('p.mlir', Loc.pos(l1, c1), Loc.pos(l2, c2)));

function singleOpModule(attrs: IrTypes.AttrDict): IrTypes.Module {
  return TestFactories.module([TestFactories.op('test.props', { attrs })]);
}

function attrDict(keys: readonly string[], values: readonly IrTypes.Attr[]): Record<string, IrTypes.Attr> {
  const dict: Record<string, IrTypes.Attr> = {};
  keys.forEach((key, i) => {
    const value = values[i];
    if (value) dict[key] = value;
  });
  return dict;
}

describe('打印器性质', () => {
  it('同一模块多次打印结果相同', () => {
    fc.assert(
      fc.property(fc.uniqueArray(attrKey, { maxLength: 6 }), fc.array(scalarAttr, { minLength: 6, maxLength: 6 }), (keys, values) => {
        const m = singleOpModule(attrDict(keys, values));
        return printModule(m) === printModule(m);
      }),
      { numRuns: 100 }
    );
  });

  it('属性输出与插入顺序无关', () => {
    fc.assert(
      fc.property(fc.uniqueArray(attrKey, { minLength: 1, maxLength: 6 }), fc.array(scalarAttr, { minLength: 6, maxLength: 6 }), (keys, values) => {
        const forward = attrDict(keys, values);
        const reversed = attrDict([...keys].reverse(), [...values.slice(0, keys.length)].reverse());
        return printModule(singleOpModule(forward)) === printModule(singleOpModule(reversed));
      }),
      { numRuns: 100 }
    );
  });

  it('仅当存在 callee 键时使用 <{...}>', () => {
    fc.assert(
      fc.property(fc.uniqueArray(attrKey, { minLength: 1, maxLength: 5 }), keys => {
        const dict = attrDict(keys, keys.map(() => Attr.Unit()));
        const text = printModule(singleOpModule(dict));
        return text.includes(' <{') === keys.includes('callee');
      }),
      { numRuns: 100 }
    );
  });

  it('每个顶层操作恰好输出一行', () => {
    fc.assert(
      fc.property(fc.array(fc.stringMatching(/^[a-z]{1,5}\.[a-z]{1,5}$/), { maxLength: 8 }), names => {
        const text = printModule(TestFactories.module(names.map(n => TestFactories.op(n))));
        const lines = text.split('\n');
        return lines.length === names.length + 3 && lines[0] === 'module {' && lines[names.length + 1] === '}';
      }),
      { numRuns: 100 }
    );
  });

  it('有限浮点数总是固定 6 位小数', () => {
    fc.assert(
      fc.property(fc.double({ noNaN: true, noDefaultInfinity: true }), x => /^-?\d+\.\d{6}$/.test(formatFloat(x))),
      { numRuns: 200 }
    );
  });
});

describe('位置合并性质', () => {
  it('合并结果覆盖两个输入区间', () => {
    fc.assert(
      fc.property(location, location, (a, b) => {
        const c = Loc.combine(a, b);
        return (
          comparePositions(c.start, a.start) <= 0 &&
          comparePositions(c.start, b.start) <= 0 &&
          comparePositions(c.end, a.end) >= 0 &&
          comparePositions(c.end, b.end) >= 0
        );
      }),
      { numRuns: 200 }
    );
  });

  it('合并的起止与参数顺序无关', () => {
    fc.assert(
      fc.property(location, location, (a, b) => {
        const ab = Loc.combine(a, b);
        const ba = Loc.combine(b, a);
        return comparePositions(ab.start, ba.start) === 0 && comparePositions(ab.end, ba.end) === 0;
      }),
      { numRuns: 200 }
    );
  });

  it('合并自身不变', () => {
    fc.assert(
      fc.property(location, a => {
        assert.deepEqual(Loc.combine(a, a), a);
      }),
      { numRuns: 100 }
    );
  });
});
