/**
 * 自我对弈运行器
 *
 * 使用任意策略连续进行多局完整游戏，统计得分、最大方块和里程碑达成率。
 * 用于比较不同策略与启发式的实际表现。
 */

import { Board, getMaxTile } from './board';
import { consoleLogger, Logger } from './diagnostics';
import { GameSimulator, getSimulator } from './game';
import { createRng, Random } from './random';
import type { Strategy } from './strategies';

// ============================================
// 类型定义
// ============================================

/**
 * 运行配置
 */
export interface RunnerConfig {
  /** 游戏局数 */
  games: number;

  /** 单局最大移动数（0表示不限制） */
  maxMoves: number;

  /** 进度报告间隔（每多少局报告一次，0表示不报告） */
  reportInterval: number;
}

/**
 * 默认运行配置
 */
export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  games: 10,
  maxMoves: 0,
  reportInterval: 0,
};

/**
 * 单局游戏结果
 */
export interface GameResult {
  /** 最终棋盘 */
  board: Board;

  /** 合并累计得分 */
  score: number;

  /** 最大方块值 */
  maxTile: number;

  /** 移动次数 */
  moves: number;
}

/**
 * 运行统计
 */
export interface RunnerStats {
  /** 已完成局数 */
  games: number;

  /** 总得分 */
  totalScore: number;

  /** 平均得分 */
  avgScore: number;

  /** 单局最高得分 */
  bestScore: number;

  /** 最大方块值 */
  maxTile: number;

  /** 总移动次数 */
  totalMoves: number;

  /** 达到2048的比例 */
  rate2048: number;

  /** 达到4096的比例 */
  rate4096: number;

  /** 达到8192的比例 */
  rate8192: number;

  /** 每秒局数 */
  gamesPerSecond: number;

  /** 已用时间（秒） */
  elapsedTime: number;
}

/**
 * 运行器依赖
 */
export interface RunnerDependencies {
  rng?: Random;
  simulator?: GameSimulator;
  logger?: Logger;
}

// ============================================
// 运行器
// ============================================

export class SelfPlayRunner {
  private readonly strategy: Strategy;
  private readonly config: RunnerConfig;
  private readonly rng: Random;
  private readonly simulator: GameSimulator;
  private readonly logger: Logger;

  private stats: RunnerStats;
  private milestoneCount: { tile2048: number; tile4096: number; tile8192: number };
  private startTime: number;

  /**
   * @param strategy 走法策略
   * @param config 运行配置（可选，使用默认值）
   */
  constructor(strategy: Strategy, config: Partial<RunnerConfig> = {}, deps: RunnerDependencies = {}) {
    this.strategy = strategy;
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
    this.rng = deps.rng ?? createRng();
    this.simulator = deps.simulator ?? getSimulator();
    this.logger = deps.logger ?? consoleLogger;

    this.stats = SelfPlayRunner.emptyStats();
    this.milestoneCount = { tile2048: 0, tile4096: 0, tile8192: 0 };
    this.startTime = 0;
  }

  private static emptyStats(): RunnerStats {
    return {
      games: 0,
      totalScore: 0,
      avgScore: 0,
      bestScore: 0,
      maxTile: 0,
      totalMoves: 0,
      rate2048: 0,
      rate4096: 0,
      rate8192: 0,
      gamesPerSecond: 0,
      elapsedTime: 0,
    };
  }

  /**
   * 运行所有局并返回统计
   */
  run(): RunnerStats {
    this.stats = SelfPlayRunner.emptyStats();
    this.milestoneCount = { tile2048: 0, tile4096: 0, tile8192: 0 };
    this.startTime = Date.now();

    for (let game = 1; game <= this.config.games; game++) {
      const result = this.playGame();
      this.updateStats(result);

      if (this.config.reportInterval > 0 && game % this.config.reportInterval === 0) {
        this.reportProgress();
      }
    }

    return this.getStats();
  }

  /**
   * 进行一局游戏：两个初始方块，然后循环 选择 -> 移动 -> 生成
   */
  playGame(): GameResult {
    const { simulator, rng } = this;
    let board = simulator.spawnTile(simulator.spawnTile(0n, rng), rng);
    let score = 0;
    let moves = 0;

    while (!simulator.isGameOver(board)) {
      if (this.config.maxMoves > 0 && moves >= this.config.maxMoves) break;

      const direction = this.strategy.pickMove(board);
      const result = simulator.makeMoveWithScore(board, direction);
      // 策略给出无效方向时结束本局
      if (result.board === board) break;

      board = simulator.spawnTile(result.board, rng);
      score += result.score;
      moves++;
    }

    return { board, score, maxTile: getMaxTile(board), moves };
  }

  getStats(): RunnerStats {
    return { ...this.stats };
  }

  private updateStats(result: GameResult): void {
    const stats = this.stats;
    stats.games++;
    stats.totalScore += result.score;
    stats.avgScore = stats.totalScore / stats.games;
    stats.bestScore = Math.max(stats.bestScore, result.score);
    stats.maxTile = Math.max(stats.maxTile, result.maxTile);
    stats.totalMoves += result.moves;

    if (result.maxTile >= 2048) this.milestoneCount.tile2048++;
    if (result.maxTile >= 4096) this.milestoneCount.tile4096++;
    if (result.maxTile >= 8192) this.milestoneCount.tile8192++;

    stats.rate2048 = this.milestoneCount.tile2048 / stats.games;
    stats.rate4096 = this.milestoneCount.tile4096 / stats.games;
    stats.rate8192 = this.milestoneCount.tile8192 / stats.games;

    stats.elapsedTime = (Date.now() - this.startTime) / 1000;
    stats.gamesPerSecond = stats.elapsedTime > 0 ? stats.games / stats.elapsedTime : 0;
  }

  /**
   * 输出进度报告（单行格式）
   */
  private reportProgress(): void {
    const { stats } = this;
    const progress = (stats.games / this.config.games * 100).toFixed(1);

    const barWidth = 20;
    const filled = Math.round(stats.games / this.config.games * barWidth);
    const bar = '█'.repeat(filled) + '░'.repeat(barWidth - filled);

    this.logger.info(
      `[${bar}] ${progress.padStart(5)}% | ` +
      `Games: ${stats.games}/${this.config.games} | ` +
      `Avg: ${stats.avgScore.toFixed(0)} | ` +
      `Max: ${stats.maxTile} | ` +
      `2048: ${(stats.rate2048 * 100).toFixed(1)}% | ` +
      `${this.strategy.kind}`
    );
  }
}
