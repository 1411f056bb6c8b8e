import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Loc, comparePositions } from '../../../src/core/location.js';

describe('Loc', () => {
  describe('comparePositions', () => {
    it('应先按行比较', () => {
      assert.ok(comparePositions(Loc.pos(1, 9), Loc.pos(2, 0)) < 0);
      assert.ok(comparePositions(Loc.pos(3, 0), Loc.pos(2, 9)) > 0);
    });

    it('同一行时按列比较', () => {
      assert.ok(comparePositions(Loc.pos(4, 1), Loc.pos(4, 2)) < 0);
      assert.equal(comparePositions(Loc.pos(4, 2), Loc.pos(4, 2)), 0);
    });
  });

  describe('combine', () => {
    it('应返回覆盖两个区间的最小区间', () => {
      const a = Loc.make('main.mlir', Loc.pos(1, 0), Loc.pos(1, 5));
      const b = Loc.make('main.mlir', Loc.pos(2, 0), Loc.pos(2, 3));

      const merged = Loc.combine(a, b);

      assert.deepEqual(merged.start, { line: 1, col: 0 });
      assert.deepEqual(merged.end, { line: 2, col: 3 });
      assert.equal(merged.file, 'main.mlir');
    });

    it('参数顺序颠倒时区间不变', () => {
      const a = Loc.make('main.mlir', Loc.pos(1, 0), Loc.pos(1, 5));
      const b = Loc.make('main.mlir', Loc.pos(2, 0), Loc.pos(2, 3));

      const merged = Loc.combine(b, a);

      assert.deepEqual(merged.start, { line: 1, col: 0 });
      assert.deepEqual(merged.end, { line: 2, col: 3 });
    });

    it('同一行内按列取最早起点和最晚终点', () => {
      const a = Loc.make('f', Loc.pos(5, 4), Loc.pos(5, 6));
      const b = Loc.make('f', Loc.pos(5, 2), Loc.pos(5, 5));

      const merged = Loc.combine(a, b);

      assert.deepEqual(merged.start, { line: 5, col: 2 });
      assert.deepEqual(merged.end, { line: 5, col: 6 });
    });

    it('文件名不同时不报错，保留第一个文件名', () => {
      const a = Loc.make('a.mlir', Loc.pos(3, 0), Loc.pos(3, 1));
      const b = Loc.make('b.mlir', Loc.pos(1, 0), Loc.pos(1, 1));

      const merged = Loc.combine(a, b);

      assert.equal(merged.file, 'a.mlir');
      assert.deepEqual(merged.start, { line: 1, col: 0 });
      assert.deepEqual(merged.end, { line: 3, col: 1 });
    });

    it('不修改输入区间', () => {
      const a = Loc.make('f', Loc.pos(2, 0), Loc.pos(2, 1));
      const b = Loc.make('f', Loc.pos(1, 0), Loc.pos(1, 1));

      Loc.combine(a, b);

      assert.deepEqual(a.start, { line: 2, col: 0 });
      assert.deepEqual(b.end, { line: 1, col: 1 });
    });
  });

  it('unknown 位置应可被识别', () => {
    assert.equal(Loc.isUnknown(Loc.unknown()), true);
    assert.equal(Loc.isUnknown(Loc.make('x.mlir', Loc.pos(0, 0), Loc.pos(0, 0))), false);
  });
});
