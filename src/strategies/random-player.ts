/**
 * 随机策略：在当前有效方向中等概率选择（基准对照）
 */

import type { Board } from '../board';
import { Direction, DIRECTIONS, GameSimulator, getSimulator } from '../game';
import { createRng, pickRandom, Random } from '../random';
import type { Strategy, StrategyOptions } from './types';

export class RandomPlayer implements Strategy {
  readonly kind = 'random';

  private readonly simulator: GameSimulator;
  private readonly rng: Random;

  constructor(options: StrategyOptions = {}) {
    this.simulator = options.simulator ?? getSimulator();
    this.rng = options.rng ?? createRng();
  }

  pickMove(board: Board): Direction {
    const legal = this.simulator.legalDirections(board);
    if (legal.length === 0) return DIRECTIONS[0];
    return pickRandom(this.rng, legal);
  }
}
