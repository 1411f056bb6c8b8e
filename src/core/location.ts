import type { Location, Position } from '../types.js';

const UNKNOWN_FILE = '<unknown>';

/**
 * 按行、再按列比较两个位置。
 *
 * @returns 负数表示 a 在前，正数表示 b 在前，0 表示相同
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.col - b.col;
}

export const Loc = {
  make: (file: string, start: Position, end: Position): Location => ({ file, start, end }),

  pos: (line: number, col: number): Position => ({ line, col }),

  unknown: (): Location => ({
    file: UNKNOWN_FILE,
    start: { line: 0, col: 0 },
    end: { line: 0, col: 0 },
  }),

  isUnknown: (loc: Location): boolean => loc.file === UNKNOWN_FILE,

  /**
   * 合并两个位置区间，返回覆盖二者的最小区间。
   *
   * 假定二者属于同一文件但不做校验：结果总是沿用 `a` 的文件名。
   */
  combine: (a: Location, b: Location): Location => ({
    file: a.file,
    start: comparePositions(a.start, b.start) <= 0 ? a.start : b.start,
    end: comparePositions(a.end, b.end) >= 0 ? a.end : b.end,
  }),
};
