/**
 * 蒙特卡洛策略
 *
 * 对每个候选方向进行若干次随机模拟：先执行该方向，
 * 然后反复生成方块并随机选择有效方向，直到游戏结束或达到步数上限。
 * 取最终棋盘评估值的平均，平均值最高的方向胜出。
 */

import type { Board } from '../board';
import { DEFAULT_PLAYOUT_MOVE_LIMIT } from '../config';
import { Direction, DIRECTIONS, GameSimulator, getSimulator } from '../game';
import { Heuristic, scoreHeuristic } from '../heuristics';
import { createRng, pickRandom, Random } from '../random';
import type { SearchResult, Strategy, StrategyOptions } from './types';

export interface MonteCarloOptions extends StrategyOptions {
  /** 单次模拟的最大移动数 */
  moveLimit?: number;
  /** 最终棋盘的评估函数（默认为得分） */
  evaluator?: Heuristic;
}

export class MonteCarloPlayer implements Strategy {
  readonly kind = 'monte-carlo';

  /** 每个方向的模拟次数 */
  readonly iterations: number;

  readonly moveLimit: number;

  readonly evaluator: Heuristic;

  private readonly simulator: GameSimulator;
  private readonly rng: Random;

  constructor(iterations: number, options: MonteCarloOptions = {}) {
    this.iterations = Number.isFinite(iterations) ? Math.max(1, Math.floor(iterations)) : 1;
    this.moveLimit = Math.max(0, Math.floor(options.moveLimit ?? DEFAULT_PLAYOUT_MOVE_LIMIT));
    this.evaluator = options.evaluator ?? scoreHeuristic;
    this.simulator = options.simulator ?? getSimulator();
    this.rng = options.rng ?? createRng();
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

      let total = 0;
      for (let i = 0; i < this.iterations; i++) {
        total += this.playout(next);
      }
      const average = total / this.iterations;

      if (average > bestValue) {
        bestValue = average;
        bestDirection = direction;
      }
    }

    return { direction: bestDirection, value: bestValue };
  }

  /**
   * 从移动后的局面开始随机模拟
   * @returns 最终棋盘的评估值
   */
  playout(afterstate: Board): number {
    let board = afterstate;

    for (let moves = 0; moves < this.moveLimit; moves++) {
      board = this.simulator.spawnTile(board, this.rng);
      const legal = this.simulator.legalDirections(board);
      if (legal.length === 0) break;
      board = this.simulator.makeMove(board, pickRandom(this.rng, legal));
    }

    return this.evaluator(board);
  }
}
