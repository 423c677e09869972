/**
 * 启发式评估函数
 *
 * 所有评估函数都是纯函数：输入位棋盘，输出有限实数，越大越好。
 * 可以在任意数量的搜索中并发调用。
 */

import { Board, decode, getScore } from './board';
import { reportWarning, SolverWarningType, WarningHandler } from './diagnostics';

/**
 * 启发式评估函数类型
 */
export type Heuristic = (board: Board) => number;

/** 蛇形路径：第0行从左到右，第1行从右到左，依此类推 */
const SNAKE_PATH = [0, 1, 2, 3, 7, 6, 5, 4, 8, 9, 10, 11, 15, 14, 13, 12];

/** 顶边路径（锚定左上角） */
const TOP_WALL_PATH = [0, 1, 2, 3];

/**
 * 角落权重矩阵（锚定左上角）
 * 权重沿曼哈顿距离递减
 */
const CORNER_WEIGHTS = [
  4, 3, 2, 1,
  3, 2, 1, 0,
  2, 1, 0, -1,
  1, 0, -1, -2,
];

/**
 * 偏斜角落权重矩阵（锚定左上角）
 * 第一行权重远高于第一列，引导大数沿顶边排列
 */
const SKEWED_CORNER_WEIGHTS = [
  10, 8, 7, 6.5,
  0.5, 0.7, 1, 3,
  -0.5, -1.5, -1.8, -2,
  -3.8, -3.7, -3.5, -3,
];

function tileValue(exp: number): number {
  return exp === 0 ? 0 : 1 << exp;
}

function weightedSum(board: Board, weights: readonly number[]): number {
  const tiles = decode(board);
  let sum = 0;
  for (let i = 0; i < 16; i++) {
    sum += weights[i] * tileValue(tiles[i]);
  }
  return sum;
}

/**
 * 沿路径累加单调递减链上的方块值
 * @param allowGaps 为true时跳过链中的空格，否则遇到空格即停止
 */
function wallChain(board: Board, path: readonly number[], allowGaps: boolean): number {
  const tiles = decode(board);
  let previous = Infinity;
  let sum = 0;

  for (const pos of path) {
    const exp = tiles[pos];
    if (exp === 0) {
      if (allowGaps) continue;
      break;
    }
    if (exp > previous) break;
    sum += tileValue(exp);
    previous = exp;
  }

  return sum;
}

// ============================================
// 评估函数
// ============================================

/**
 * 得分：所有方块值之和
 */
export const scoreHeuristic: Heuristic = board => getScore(board);

/**
 * 合并潜力：相邻相同方块对的指数之和
 */
export const mergeHeuristic: Heuristic = board => {
  const tiles = decode(board);
  let potential = 0;

  for (let r = 0; r < 4; r++) {
    for (let c = 0; c < 4; c++) {
      const exp = tiles[r * 4 + c];
      if (exp === 0) continue;
      // 检查右边
      if (c < 3 && tiles[r * 4 + c + 1] === exp) potential += exp;
      // 检查下边
      if (r < 3 && tiles[(r + 1) * 4 + c] === exp) potential += exp;
    }
  }

  return potential;
};

/**
 * 角落：按角落权重矩阵加权的方块值之和
 */
export const cornerHeuristic: Heuristic = board => weightedSum(board, CORNER_WEIGHTS);

/**
 * 偏斜角落：按偏斜权重矩阵加权的方块值之和
 */
export const skewedCornerHeuristic: Heuristic = board => weightedSum(board, SKEWED_CORNER_WEIGHTS);

/**
 * 严格墙：从左上角沿顶边的单调递减链，空格中断
 */
export const strictWallHeuristic: Heuristic = board => wallChain(board, TOP_WALL_PATH, false);

/**
 * 带间隙的墙：同严格墙，但链中允许空格
 */
export const wallGapHeuristic: Heuristic = board => wallChain(board, TOP_WALL_PATH, true);

/**
 * 完整墙：沿整条蛇形路径的单调递减链，空格中断
 */
export const fullWallHeuristic: Heuristic = board => wallChain(board, SNAKE_PATH, false);

/**
 * 单调性：惩罚行列中违背单调顺序的指数差
 * 每行/列取递增、递减两种方向中惩罚较小者
 */
export const monotonicityHeuristic: Heuristic = board => {
  const tiles = decode(board);
  let penalty = 0;

  for (let line = 0; line < 4; line++) {
    let rowInc = 0;
    let rowDec = 0;
    let colInc = 0;
    let colDec = 0;
    for (let k = 0; k < 3; k++) {
      const rowDiff = tiles[line * 4 + k + 1] - tiles[line * 4 + k];
      if (rowDiff > 0) rowDec += rowDiff;
      else rowInc -= rowDiff;

      const colDiff = tiles[(k + 1) * 4 + line] - tiles[k * 4 + line];
      if (colDiff > 0) colDec += colDiff;
      else colInc -= colDiff;
    }
    penalty += Math.min(rowInc, rowDec) + Math.min(colInc, colDec);
  }

  return 0 - penalty;
};

// ============================================
// 名称解析
// ============================================

/**
 * 启发式名称表（键为规范化后的名称）
 */
export const HEURISTICS: Readonly<Record<string, Heuristic>> = Object.freeze({
  score: scoreHeuristic,
  merge: mergeHeuristic,
  corner: cornerHeuristic,
  corner_bias: cornerHeuristic,
  'corner-bias': cornerHeuristic,
  skewed_corner: skewedCornerHeuristic,
  'skewed-corner': skewedCornerHeuristic,
  wall: strictWallHeuristic,
  strict_wall: strictWallHeuristic,
  'strict-wall': strictWallHeuristic,
  wall_gap: wallGapHeuristic,
  'wall-gap': wallGapHeuristic,
  full_wall: fullWallHeuristic,
  'full-wall': fullWallHeuristic,
  monotonicity: monotonicityHeuristic,
});

/**
 * 规范化名称：只转小写，不去空白也不替换分隔符
 */
export function normalizeHeuristicName(name: string): string {
  return name.toLowerCase();
}

/**
 * 按名称解析启发式函数
 * 无法识别的名称回退到 corner
 */
export function resolveHeuristic(name: string, onWarning?: WarningHandler): Heuristic {
  const key = normalizeHeuristicName(name);
  if (Object.prototype.hasOwnProperty.call(HEURISTICS, key)) {
    return HEURISTICS[key];
  }

  reportWarning(
    onWarning,
    SolverWarningType.UNKNOWN_HEURISTIC,
    `Unknown heuristic "${name}", falling back to corner`,
    { heuristic: name }
  );
  return cornerHeuristic;
}
