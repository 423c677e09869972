/**
 * 固定深度 Expectimax 搜索
 *
 * 玩家节点取四个方向中期望值最大者（平局取枚举顺序靠前的方向），
 * 随机节点对所有空格等概率取平均，每个空格 90% 生成2、10% 生成4。
 * 深度为0时直接使用启发式评估。结果完全确定。
 */

import { Board, setTile } from '../board';
import { SPAWN_FOUR_PROBABILITY, SPAWN_TWO_PROBABILITY } from '../config';
import { Direction, DIRECTIONS, GameSimulator, getSimulator } from '../game';
import type { Heuristic } from '../heuristics';
import type { SearchResult, Strategy, StrategyOptions } from './types';

/** 转置表：按剩余深度分层缓存玩家节点的值 */
type TranspositionTable = Map<Board, number>[];

export class ExpectimaxDepthStrategy implements Strategy {
  readonly kind = 'expectimax-depth';

  /** 搜索深度（玩家移动层数） */
  readonly depth: number;

  /** 叶子节点评估函数 */
  readonly evaluator: Heuristic;

  private readonly simulator: GameSimulator;

  constructor(depth: number, evaluator: Heuristic, options: StrategyOptions = {}) {
    this.depth = Number.isFinite(depth) ? Math.max(1, Math.floor(depth)) : 1;
    this.evaluator = evaluator;
    this.simulator = options.simulator ?? getSimulator();
  }

  pickMove(board: Board): Direction {
    return this.search(board).direction;
  }

  /**
   * 搜索最佳方向及其期望值
   * 转置表只在一次搜索内有效，不影响计算结果
   */
  search(board: Board): SearchResult {
    const table: TranspositionTable = [];
    let bestDirection: Direction = DIRECTIONS[0];
    let bestValue = -Infinity;

    for (const direction of DIRECTIONS) {
      const next = this.simulator.makeMove(board, direction);
      if (next === board) continue;

      const value = this.chanceNode(next, this.depth, table);
      if (value > bestValue) {
        bestValue = value;
        bestDirection = direction;
      }
    }

    return { direction: bestDirection, value: bestValue };
  }

  /**
   * 玩家节点
   */
  private maxNode(board: Board, depth: number, table: TranspositionTable): number {
    if (depth <= 0) return this.evaluator(board);

    let layer = table[depth];
    if (!layer) {
      layer = new Map();
      table[depth] = layer;
    }
    const cached = layer.get(board);
    if (cached !== undefined) return cached;

    let best = -Infinity;
    for (const direction of DIRECTIONS) {
      const next = this.simulator.makeMove(board, direction);
      if (next === board) continue;
      const value = this.chanceNode(next, depth, table);
      if (value > best) best = value;
    }

    // 无路可走：按当前局面评估
    const result = best === -Infinity ? this.evaluator(board) : best;
    layer.set(board, result);
    return result;
  }

  /**
   * 随机节点：对每个空格分别考虑生成2和4
   */
  private chanceNode(board: Board, depth: number, table: TranspositionTable): number {
    const empties = this.simulator.emptyPositions(board);
    if (empties.length === 0) return this.evaluator(board);

    let total = 0;
    for (const pos of empties) {
      total += SPAWN_TWO_PROBABILITY * this.maxNode(setTile(board, pos, 1), depth - 1, table);
      total += SPAWN_FOUR_PROBABILITY * this.maxNode(setTile(board, pos, 2), depth - 1, table);
    }

    return total / empties.length;
  }
}
