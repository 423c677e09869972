/**
 * 有界随机试验策略
 *
 * 与蒙特卡洛不同，不模拟到游戏结束：每个候选方向之后只展开
 * branchDepth 层，每层随机抽取 width 个方块生成结果，
 * 每个结果之后随机走一步，叶子节点取启发式评估并逐层平均。
 */

import type { Board } from '../board';
import { Direction, DIRECTIONS, GameSimulator, getSimulator } from '../game';
import { Heuristic, scoreHeuristic } from '../heuristics';
import { createRng, pickRandom, Random } from '../random';
import type { SearchResult, Strategy, StrategyOptions } from './types';

export interface RandomTrialsOptions extends StrategyOptions {
  /** 叶子节点评估函数（默认为得分） */
  evaluator?: Heuristic;
}

export class RandomTrialsStrategy implements Strategy {
  readonly kind = 'random-trials';

  /** 每个方向的模拟局数 */
  readonly gamesPerMove: number;

  /** 展开层数 */
  readonly branchDepth: number;

  /** 每层分支宽度 */
  readonly width: number;

  readonly evaluator: Heuristic;

  private readonly simulator: GameSimulator;
  private readonly rng: Random;

  constructor(gamesPerMove: number, branchDepth: number, width: number, options: RandomTrialsOptions = {}) {
    this.gamesPerMove = Number.isFinite(gamesPerMove) ? Math.max(1, Math.floor(gamesPerMove)) : 1;
    this.branchDepth = Number.isFinite(branchDepth) ? Math.max(0, Math.floor(branchDepth)) : 0;
    this.width = Number.isFinite(width) ? Math.max(1, Math.floor(width)) : 1;
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
      for (let game = 0; game < this.gamesPerMove; game++) {
        total += this.trial(next, this.branchDepth);
      }
      const average = total / this.gamesPerMove;

      if (average > bestValue) {
        bestValue = average;
        bestDirection = direction;
      }
    }

    return { direction: bestDirection, value: bestValue };
  }

  /**
   * 单次试验：在移动后的局面上展开 depth 层随机分支
   */
  trial(afterstate: Board, depth: number): number {
    if (depth <= 0) return this.evaluator(afterstate);

    let total = 0;
    for (let branch = 0; branch < this.width; branch++) {
      const spawned = this.simulator.spawnTile(afterstate, this.rng);
      const legal = this.simulator.legalDirections(spawned);
      if (legal.length === 0) {
        total += this.evaluator(spawned);
        continue;
      }
      const next = this.simulator.makeMove(spawned, pickRandom(this.rng, legal));
      total += this.trial(next, depth - 1);
    }

    return total / this.width;
  }
}
