/**
 * 策略公共类型
 */

import type { Board } from '../board';
import type { Direction, GameSimulator } from '../game';
import type { Random } from '../random';

/**
 * 策略类型标识
 */
export type StrategyKind =
  | 'expectimax-depth'
  | 'expectimax-probability'
  | 'monte-carlo'
  | 'random-trials'
  | 'random';

/**
 * 走法选择策略
 *
 * 调用方应先检查游戏是否结束；在终局棋盘上调用不会抛出异常，
 * 返回值不保证是有效方向。
 */
export interface Strategy {
  readonly kind: StrategyKind;
  pickMove(board: Board): Direction;
}

/**
 * 搜索结果
 */
export interface SearchResult {
  /** 最佳方向 */
  direction: Direction;
  /** 最佳方向的期望值，没有有效方向时为 -Infinity */
  value: number;
}

/**
 * 策略的可选依赖
 */
export interface StrategyOptions {
  /** 模拟器（默认使用共享实例） */
  simulator?: GameSimulator;
  /** 随机数源（采样类策略使用，默认不设种子） */
  rng?: Random;
}
