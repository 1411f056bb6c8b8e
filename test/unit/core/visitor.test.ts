import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Attr, Ir } from '../../../src/core/ir.js';
import { DefaultIrVisitor } from '../../../src/core/visitor.js';
import type { Ir as IrTypes } from '../../../src/types.js';
import { TestFactories } from '../../helpers/test-factories.js';

/** 以调用方提供的数组作为上下文记录遍历顺序 */
class TraceVisitor extends DefaultIrVisitor<string[]> {
  override visitOperation(op: IrTypes.Operation, trace: string[]): void {
    trace.push(`op:${op.name}`);
    super.visitOperation(op, trace);
  }

  override visitBlock(b: IrTypes.Block, label: string, trace: string[]): void {
    trace.push(`block:${label}`);
    super.visitBlock(b, label, trace);
  }

  override visitAttr(name: string, _a: IrTypes.Attr, trace: string[]): void {
    trace.push(`attr:${name}`);
  }

  override visitType(t: IrTypes.Type, trace: string[]): void {
    trace.push(`type:${t.kind}`);
  }
}

describe('DefaultIrVisitor', () => {
  it('深度优先遍历：块体在前，终结符在后，附加块按声明顺序', () => {
    const region = Ir.Region(
      Ir.Block([], [TestFactories.op('test.a')], TestFactories.terminator('cf.br', { successors: ['next'] })),
      [['next', Ir.Block([], [], TestFactories.terminator('test.yield'))]]
    );
    const m = TestFactories.module([
      TestFactories.op('test.outer', { regions: [region], attrs: { sym_name: Attr.String('f') } }),
      TestFactories.op('test.after'),
    ]);

    const trace: string[] = [];
    new TraceVisitor().visitModule(m, trace);

    assert.deepEqual(trace, [
      'op:test.outer',
      'attr:sym_name',
      'block:bb0',
      'op:test.a',
      'op:cf.br',
      'block:next',
      'op:test.yield',
      'op:test.after',
    ]);
  });

  it('上下文原样传给可选钩子：结果类型先于区域，块参数先于块体', () => {
    const region = TestFactories.singleBlockRegion(
      [TestFactories.op('test.body')],
      TestFactories.terminator('test.yield'),
      [Ir.Value('%arg', Ir.Index)]
    );
    const m = TestFactories.module([
      TestFactories.op('test.host', { results: [Ir.Value('%r', Ir.F32)], regions: [region] }),
    ]);

    const trace: string[] = [];
    new TraceVisitor().visitModule(m, trace);

    assert.deepEqual(trace, [
      'op:test.host',
      'type:Float',
      'block:bb0',
      'type:Index',
      'op:test.body',
      'op:test.yield',
    ]);
  });

  it('默认实现不需要上下文', () => {
    const seen: string[] = [];
    class NameCollector extends DefaultIrVisitor {
      override visitOperation(op: IrTypes.Operation): void {
        seen.push(op.name);
        super.visitOperation(op);
      }
    }

    new NameCollector().visitModule(TestFactories.module([TestFactories.op('test.x'), TestFactories.op('test.y')]));

    assert.deepEqual(seen, ['test.x', 'test.y']);
  });
});
