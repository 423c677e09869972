/**
 * 策略工厂
 *
 * 将策略类型字符串、启发式名称和数值参数解析为具体策略。
 * 任何输入都不会导致异常：未知名称和非法参数按固定规则回退。
 *
 * | 输入                                     | 规则                           |
 * |------------------------------------------|--------------------------------|
 * | 未知策略类型                             | 回退到 expectimax-depth        |
 * | depth ≤ 0（expectimax-depth 或回退）     | 深度 4                         |
 * | probability 非正（expectimax-probability）| 0.001                          |
 * | monte-carlo 且 trials ≤ 0                | max(128, depth·128)，depth 非有限时为 128 |
 * | random-trials 且 trials ≤ 0              | gamesPerMove = 32              |
 * | random-trials 且 depth ≤ 0               | branchDepth = 3                |
 * | random-trials                            | 宽度固定为 2                   |
 * | 未知启发式名称                           | 回退到 corner                  |
 */

import type { Board } from './board';
import {
  DEFAULT_BRANCH_DEPTH,
  DEFAULT_GAMES_PER_MOVE,
  DEFAULT_PROBABILITY_THRESHOLD,
  DEFAULT_SEARCH_DEPTH,
  DEFAULT_STRATEGY_SETTINGS,
  MONTE_CARLO_ITERATIONS_PER_DEPTH,
  RANDOM_TRIALS_WIDTH,
  StrategySettings,
} from './config';
import { reportWarning, SolverWarningType, WarningHandler } from './diagnostics';
import type { Direction } from './game';
import { Heuristic, normalizeHeuristicName, resolveHeuristic } from './heuristics';
import {
  ExpectimaxDepthStrategy,
  ExpectimaxProbabilityStrategy,
  MonteCarloPlayer,
  RandomPlayer,
  RandomTrialsStrategy,
} from './strategies';
import type { Strategy, StrategyKind, StrategyOptions } from './strategies';

/**
 * 工厂选项
 */
export interface FactoryOptions extends StrategyOptions {
  /** 回退时的警告回调 */
  onWarning?: WarningHandler;
  /** expectimax-probability 的最大搜索层数（默认 8） */
  probabilityMaxDepth?: number;
}

/** 策略类型别名表（键为规范化后的名称） */
const STRATEGY_ALIASES: Readonly<Record<string, StrategyKind>> = Object.freeze({
  'expectimax-depth': 'expectimax-depth',
  expectimax: 'expectimax-depth',
  'expectimax-probability': 'expectimax-probability',
  'monte-carlo': 'monte-carlo',
  'random-trials': 'random-trials',
  random: 'random',
});

/**
 * 规范化策略类型：只转小写，'monte_carlo' 之类的拼写视为未知类型
 */
export function normalizeStrategyType(type: string): string {
  return type.toLowerCase();
}

/**
 * 解析策略类型，未知类型返回 null
 */
export function resolveStrategyKind(type: string): StrategyKind | null {
  const key = normalizeStrategyType(type);
  return Object.prototype.hasOwnProperty.call(STRATEGY_ALIASES, key) ? STRATEGY_ALIASES[key] : null;
}

function defaultedDepth(depth: number, onWarning: WarningHandler | undefined): number {
  if (depth > 0) return depth;
  reportWarning(onWarning, SolverWarningType.PARAMETER_DEFAULTED, `Depth ${depth} is not positive, using ${DEFAULT_SEARCH_DEPTH}`, {
    parameter: 'depth',
    value: depth,
  });
  return DEFAULT_SEARCH_DEPTH;
}

/**
 * 创建策略
 * @param type 策略类型（大小写不敏感）
 * @param heuristic 启发式名称或评估函数
 * @param depth 搜索深度（random-trials 中为分支深度）
 * @param probability expectimax-probability 的概率阈值
 * @param trials 模拟次数（monte-carlo、random-trials 使用）
 */
export function createStrategy(
  type: string,
  heuristic: string | Heuristic,
  depth: number,
  probability: number,
  trials: number,
  options: FactoryOptions = {}
): Strategy {
  const { onWarning, simulator, rng, probabilityMaxDepth } = options;
  const evaluator = typeof heuristic === 'string' ? resolveHeuristic(heuristic, onWarning) : heuristic;
  const kind = resolveStrategyKind(type);

  switch (kind) {
    case 'expectimax-depth':
      return new ExpectimaxDepthStrategy(defaultedDepth(depth, onWarning), evaluator, { simulator });

    case 'expectimax-probability': {
      let threshold = probability;
      if (!(threshold > 0)) {
        reportWarning(
          onWarning,
          SolverWarningType.PARAMETER_DEFAULTED,
          `Probability ${probability} is not positive, using ${DEFAULT_PROBABILITY_THRESHOLD}`,
          { parameter: 'probability', value: probability }
        );
        threshold = DEFAULT_PROBABILITY_THRESHOLD;
      }
      return new ExpectimaxProbabilityStrategy(threshold, evaluator, { simulator, maxDepth: probabilityMaxDepth });
    }

    case 'monte-carlo': {
      let iterations = trials;
      if (!(iterations > 0)) {
        const depthUnits = Number.isFinite(depth) ? depth : 0;
        iterations = Math.max(MONTE_CARLO_ITERATIONS_PER_DEPTH, depthUnits * MONTE_CARLO_ITERATIONS_PER_DEPTH);
        reportWarning(onWarning, SolverWarningType.PARAMETER_DEFAULTED, `Trials ${trials} is not positive, using ${iterations}`, {
          parameter: 'trials',
          value: trials,
        });
      }
      return new MonteCarloPlayer(iterations, { simulator, rng });
    }

    case 'random-trials': {
      let gamesPerMove = trials;
      if (!(gamesPerMove > 0)) {
        reportWarning(
          onWarning,
          SolverWarningType.PARAMETER_DEFAULTED,
          `Trials ${trials} is not positive, using ${DEFAULT_GAMES_PER_MOVE}`,
          { parameter: 'trials', value: trials }
        );
        gamesPerMove = DEFAULT_GAMES_PER_MOVE;
      }
      let branchDepth = depth;
      if (!(branchDepth > 0)) {
        reportWarning(
          onWarning,
          SolverWarningType.PARAMETER_DEFAULTED,
          `Depth ${depth} is not positive, using ${DEFAULT_BRANCH_DEPTH}`,
          { parameter: 'depth', value: depth }
        );
        branchDepth = DEFAULT_BRANCH_DEPTH;
      }
      return new RandomTrialsStrategy(gamesPerMove, branchDepth, RANDOM_TRIALS_WIDTH, { simulator, rng });
    }

    case 'random':
      return new RandomPlayer({ simulator, rng });

    case null:
      reportWarning(onWarning, SolverWarningType.UNKNOWN_STRATEGY, `Unknown strategy type "${type}", falling back to expectimax-depth`, {
        type,
      });
      return new ExpectimaxDepthStrategy(defaultedDepth(depth, onWarning), evaluator, { simulator });
  }
}

// ============================================
// 策略句柄
// ============================================

/**
 * 策略句柄
 *
 * 不可变：configure / setTrials 返回新的句柄，调用方持有最新的句柄即可，
 * 重新配置与正在进行的 pickMove 互不干扰。
 */
export class StrategyHandle {
  readonly settings: Readonly<StrategySettings>;

  /** 当前启发式（evaluateBoard 使用） */
  readonly evaluator: Heuristic;

  readonly strategy: Strategy;

  private readonly options: FactoryOptions;

  constructor(settings: Partial<StrategySettings> = {}, options: FactoryOptions = {}) {
    const merged = { ...DEFAULT_STRATEGY_SETTINGS, ...settings };
    this.settings = Object.freeze({
      ...merged,
      type: normalizeStrategyType(merged.type),
      heuristic: normalizeHeuristicName(merged.heuristic),
    });
    this.options = options;
    this.evaluator = resolveHeuristic(this.settings.heuristic, options.onWarning);
    this.strategy = createStrategy(
      this.settings.type,
      this.evaluator,
      this.settings.depth,
      this.settings.probability,
      this.settings.trials,
      options
    );
  }

  /**
   * 重新配置策略类型、启发式、深度和概率（保留模拟次数）
   */
  configure(type: string, heuristic: string, depth: number, probability: number): StrategyHandle {
    return new StrategyHandle({ ...this.settings, type, heuristic, depth, probability }, this.options);
  }

  /**
   * 单独更新模拟次数
   */
  setTrials(trials: number): StrategyHandle {
    return new StrategyHandle({ ...this.settings, trials }, this.options);
  }

  pickMove(board: Board): Direction {
    return this.strategy.pickMove(board);
  }

  evaluateBoard(board: Board): number {
    return this.evaluator(board);
  }
}
