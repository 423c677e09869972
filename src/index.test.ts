import { describe, it, expect } from 'vitest';
import { arrayFromBoard, boardFromArray, createStrategy, Direction, makeMove } from './index';

describe('host surface', () => {
  it('converts between exponent arrays and boards', () => {
    const tiles = [1, 1, 0, 0, 2, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 3];
    const board = boardFromArray(tiles);
    expect(board).toBe(0x1100200000000003n);
    expect(arrayFromBoard(board)).toEqual(tiles);
  });

  it('clamps exponents on the way in', () => {
    expect(arrayFromBoard(boardFromArray([16, -1]))).toEqual([15, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('drives a strategy from plain arrays', () => {
    const board = boardFromArray([1, 1]);
    const direction = createStrategy('expectimax', 'corner', 1, 0, 0).pickMove(board);
    expect(makeMove(board, direction)).not.toBe(board);
    expect(direction).not.toBe(Direction.UP);
  });
});
