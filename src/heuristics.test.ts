import { describe, it, expect, vi } from 'vitest';
import { encode } from './board';
import { SolverWarningType } from './diagnostics';
import {
  cornerHeuristic,
  fullWallHeuristic,
  HEURISTICS,
  mergeHeuristic,
  monotonicityHeuristic,
  normalizeHeuristicName,
  resolveHeuristic,
  scoreHeuristic,
  skewedCornerHeuristic,
  strictWallHeuristic,
  wallGapHeuristic,
} from './heuristics';

const ALL_ZERO = 0n;
const ALL_MAX = encode(Array.from({ length: 16 }, () => 15));
const MID_GAME = encode([7, 6, 5, 3, 2, 4, 1, 0, 1, 0, 2, 0, 0, 1, 0, 0]);

describe('heuristic totality', () => {
  for (const [name, heuristic] of Object.entries(HEURISTICS)) {
    it(`${name} returns finite values`, () => {
      expect(Number.isFinite(heuristic(ALL_ZERO))).toBe(true);
      expect(Number.isFinite(heuristic(ALL_MAX))).toBe(true);
      expect(Number.isFinite(heuristic(MID_GAME))).toBe(true);
    });
  }
});

describe('scoreHeuristic', () => {
  it('sums tile values', () => {
    expect(scoreHeuristic(encode([1, 1, 2]))).toBe(8);
    expect(scoreHeuristic(ALL_ZERO)).toBe(0);
  });
});

describe('mergeHeuristic', () => {
  it('adds the exponent of each mergeable neighbour pair', () => {
    expect(mergeHeuristic(encode([1, 1]))).toBe(1);
    expect(mergeHeuristic(encode([2, 2, 2, 0, 2]))).toBe(6);
  });

  it('ignores empty neighbours', () => {
    expect(mergeHeuristic(ALL_ZERO)).toBe(0);
  });
});

describe('corner heuristics', () => {
  it('weights the anchor corner highest', () => {
    expect(cornerHeuristic(encode([1]))).toBe(8);
    expect(cornerHeuristic(encode([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1]))).toBe(-4);
  });

  it('skews weight towards the top row', () => {
    expect(skewedCornerHeuristic(encode([1]))).toBe(20);
    expect(skewedCornerHeuristic(encode([0, 0, 0, 0, 1]))).toBe(1);
  });

  it('prefers the big tile in the corner', () => {
    const inCorner = encode([5, 1]);
    const offCorner = encode([1, 5]);
    expect(cornerHeuristic(inCorner)).toBeGreaterThan(cornerHeuristic(offCorner));
    expect(skewedCornerHeuristic(inCorner)).toBeGreaterThan(skewedCornerHeuristic(offCorner));
  });
});

describe('wall heuristics', () => {
  it('strict wall stops at the first gap', () => {
    expect(strictWallHeuristic(encode([3, 2, 0, 1]))).toBe(12);
  });

  it('wall gap skips empty cells along the edge', () => {
    expect(wallGapHeuristic(encode([3, 2, 0, 1]))).toBe(14);
  });

  it('stops at the first increase', () => {
    expect(strictWallHeuristic(encode([3, 2, 3, 1]))).toBe(12);
    expect(wallGapHeuristic(encode([0, 2, 3, 1]))).toBe(4);
  });

  it('full wall follows the snake into the next row', () => {
    expect(fullWallHeuristic(encode([4, 3, 2, 1, 0, 0, 0, 1]))).toBe(32);
    expect(strictWallHeuristic(encode([4, 3, 2, 1, 0, 0, 0, 1]))).toBe(30);
  });

  it('is zero when the corner is empty', () => {
    expect(strictWallHeuristic(encode([0, 5, 4]))).toBe(0);
  });
});

describe('monotonicityHeuristic', () => {
  it('is zero for monotonic boards', () => {
    expect(monotonicityHeuristic(ALL_ZERO)).toBe(0);
    expect(monotonicityHeuristic(encode([4, 3, 2, 1, 3, 2, 1, 0, 2, 1, 0, 0, 1]))).toBe(0);
  });

  it('penalises order violations', () => {
    expect(monotonicityHeuristic(encode([1, 2, 1, 0]))).toBe(-1);
  });
});

describe('resolveHeuristic', () => {
  it('is case-insensitive and accepts hyphenated spellings', () => {
    expect(resolveHeuristic('CORNER')).toBe(cornerHeuristic);
    expect(resolveHeuristic('Strict-Wall')).toBe(strictWallHeuristic);
    expect(resolveHeuristic('full_wall')).toBe(fullWallHeuristic);
    expect(resolveHeuristic('Skewed-Corner')).toBe(skewedCornerHeuristic);
  });

  it('resolves aliases', () => {
    expect(resolveHeuristic('wall')).toBe(strictWallHeuristic);
    expect(resolveHeuristic('corner_bias')).toBe(cornerHeuristic);
  });

  it('falls back to corner and reports a warning', () => {
    const onWarning = vi.fn();
    expect(resolveHeuristic('bogus-heuristic', onWarning)).toBe(cornerHeuristic);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning.mock.calls[0][0]).toMatchObject({
      type: SolverWarningType.UNKNOWN_HEURISTIC,
      context: { heuristic: 'bogus-heuristic' },
    });
  });

  it('does not resolve inherited object keys', () => {
    expect(resolveHeuristic('constructor')).toBe(cornerHeuristic);
  });

  it('normalises names by lowercasing only', () => {
    expect(normalizeHeuristicName('Wall_Gap')).toBe('wall_gap');
    expect(normalizeHeuristicName(' Corner ')).toBe(' corner ');
  });

  it('does not trim surrounding whitespace', () => {
    const onWarning = vi.fn();
    expect(resolveHeuristic(' score ', onWarning)).toBe(cornerHeuristic);
    expect(onWarning).toHaveBeenCalledTimes(1);
  });
});
