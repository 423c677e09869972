/**
 * 概率截断 Expectimax 搜索
 *
 * 与固定深度版本的递归相同，但每条路径记录从根出发的累计概率，
 * 累计概率低于阈值的玩家节点直接使用启发式评估。
 * 可能性大的局面搜索得深，可能性小的局面搜索得浅。
 */

import { Board, setTile } from '../board';
import {
  DEFAULT_PROBABILITY_MAX_DEPTH,
  DEFAULT_PROBABILITY_THRESHOLD,
  SPAWN_FOUR_PROBABILITY,
  SPAWN_TWO_PROBABILITY,
} from '../config';
import { Direction, DIRECTIONS, GameSimulator, getSimulator } from '../game';
import type { Heuristic } from '../heuristics';
import type { SearchResult, Strategy, StrategyOptions } from './types';

export interface ExpectimaxProbabilityOptions extends StrategyOptions {
  /** 最大搜索层数，防止单一空格时无限加深 */
  maxDepth?: number;
}

export class ExpectimaxProbabilityStrategy implements Strategy {
  readonly kind = 'expectimax-probability';

  /** 累计概率阈值 */
  readonly probabilityThreshold: number;

  readonly evaluator: Heuristic;

  readonly maxDepth: number;

  private readonly simulator: GameSimulator;

  constructor(probabilityThreshold: number, evaluator: Heuristic, options: ExpectimaxProbabilityOptions = {}) {
    this.probabilityThreshold = probabilityThreshold > 0 ? probabilityThreshold : DEFAULT_PROBABILITY_THRESHOLD;
    this.evaluator = evaluator;
    const maxDepth = options.maxDepth ?? DEFAULT_PROBABILITY_MAX_DEPTH;
    this.maxDepth = Number.isFinite(maxDepth) ? Math.max(1, Math.floor(maxDepth)) : DEFAULT_PROBABILITY_MAX_DEPTH;
    this.simulator = options.simulator ?? getSimulator();
  }

  pickMove(board: Board): Direction {
    return this.search(board).direction;
  }

  search(board: Board): SearchResult {
    let bestDirection: Direction = DIRECTIONS[0];
    let bestValue = -Infinity;

    for (const direction of DIRECTIONS) {
      const next = this.simulator.makeMove(board, direction);
      if (next === board) continue;

      const value = this.chanceNode(next, 1, 1);
      if (value > bestValue) {
        bestValue = value;
        bestDirection = direction;
      }
    }

    return { direction: bestDirection, value: bestValue };
  }

  /**
   * 玩家节点
   * @param probability 从根到此节点的累计概率
   * @param ply 已展开的玩家层数
   */
  private maxNode(board: Board, probability: number, ply: number): number {
    if (probability < this.probabilityThreshold || ply >= this.maxDepth) {
      return this.evaluator(board);
    }

    let best = -Infinity;
    for (const direction of DIRECTIONS) {
      const next = this.simulator.makeMove(board, direction);
      if (next === board) continue;
      const value = this.chanceNode(next, probability, ply + 1);
      if (value > best) best = value;
    }

    return best === -Infinity ? this.evaluator(board) : best;
  }

  private chanceNode(board: Board, probability: number, ply: number): number {
    const empties = this.simulator.emptyPositions(board);
    if (empties.length === 0) return this.evaluator(board);

    const cellProbability = probability / empties.length;
    let total = 0;
    for (const pos of empties) {
      total += SPAWN_TWO_PROBABILITY *
        this.maxNode(setTile(board, pos, 1), cellProbability * SPAWN_TWO_PROBABILITY, ply);
      total += SPAWN_FOUR_PROBABILITY *
        this.maxNode(setTile(board, pos, 2), cellProbability * SPAWN_FOUR_PROBABILITY, ply);
    }

    return total / empties.length;
  }
}
