import { describe, it, expect } from 'vitest';
import {
  computeEmptyMask,
  computeRowLeft,
  getTransitionTables,
  reverseRow,
  ROW_COUNT,
  TransitionTables,
} from './tables';

/**
 * 逐格模拟：依次放入方块，与上一个未合并过的相同方块合并
 */
function slideLeftByHand(tiles: number[]): { tiles: number[]; score: number } {
  const out: number[] = [];
  const mergedAt: boolean[] = [];
  let score = 0;

  for (const tile of tiles) {
    if (tile === 0) continue;
    const last = out.length - 1;
    if (last >= 0 && out[last] === tile && !mergedAt[last]) {
      out[last] = Math.min(tile + 1, 15);
      mergedAt[last] = true;
      score += 2 ** out[last];
    } else {
      out.push(tile);
      mergedAt.push(false);
    }
  }

  while (out.length < 4) out.push(0);
  return { tiles: out, score };
}

function unpackRow(row: number): number[] {
  return [(row >> 12) & 0xf, (row >> 8) & 0xf, (row >> 4) & 0xf, row & 0xf];
}

describe('TransitionTables', () => {
  const tables = getTransitionTables();

  it('matches direct simulation for every row value', () => {
    for (let row = 0; row < ROW_COUNT; row++) {
      const expected = slideLeftByHand(unpackRow(row));
      expect(unpackRow(tables.moveLeft(row))).toEqual(expected.tiles);
      expect(tables.scoreLeft(row)).toBe(expected.score);
    }
  });

  it('merges each pair once and never re-merges a merge result', () => {
    expect(unpackRow(tables.moveLeft(0x1111))).toEqual([2, 2, 0, 0]);
    expect(unpackRow(tables.moveLeft(0x2110))).toEqual([2, 2, 0, 0]);
    expect(unpackRow(tables.moveLeft(0x1110))).toEqual([2, 1, 0, 0]);
    expect(unpackRow(tables.moveLeft(0x0101))).toEqual([2, 0, 0, 0]);
    expect(tables.scoreLeft(0x1111)).toBe(8);
  });

  it('caps merged exponents at 15', () => {
    expect(unpackRow(tables.moveLeft(0xff00))).toEqual([15, 0, 0, 0]);
  });

  it('moves right through row reversal', () => {
    expect(unpackRow(tables.moveRight(0x1110))).toEqual([0, 0, 1, 2]);
    expect(tables.scoreRight(0x1110)).toBe(4);
    expect(unpackRow(tables.moveRight(0x1234))).toEqual([1, 2, 3, 4]);
  });

  it('records the empty cells of the raw row', () => {
    expect(tables.emptyMaskOf(0x0000)).toBe(0b1111);
    expect(tables.emptyMaskOf(0x1234)).toBe(0);
    expect(tables.emptyMaskOf(0x1030)).toBe(0b1010);
    expect(computeEmptyMask(0x0200)).toBe(0b1101);
  });

  it('is built once and shared', () => {
    expect(getTransitionTables()).toBe(tables);
    expect(Object.isFrozen(tables)).toBe(true);
  });

  it('builds identical independent copies', () => {
    const other = TransitionTables.build();
    expect(other).not.toBe(tables);
    for (let row = 0; row < ROW_COUNT; row += 257) {
      expect(other.moveLeft(row)).toBe(tables.moveLeft(row));
    }
  });

  it('exposes no writable table storage', () => {
    const shared = getTransitionTables();
    expect(Object.values(shared).some(value => ArrayBuffer.isView(value))).toBe(false);
    expect(() => Object.assign(shared, { moveLeft: () => 0 })).toThrow(TypeError);
    expect(shared.moveLeft(0x1100)).toBe(0x2000);
  });
});

describe('row helpers', () => {
  it('reverses rows', () => {
    expect(reverseRow(0x1234)).toBe(0x4321);
    expect(reverseRow(reverseRow(0xa0b1))).toBe(0xa0b1);
  });

  it('computes a single row result with its score', () => {
    expect(computeRowLeft(0x2200)).toEqual({ row: 0x3000, score: 8 });
    expect(computeRowLeft(0x0000)).toEqual({ row: 0, score: 0 });
  });
});
