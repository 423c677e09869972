/**
 * 默认配置
 */

/** 生成方块为2（指数1）的概率 */
export const SPAWN_TWO_PROBABILITY = 0.9;

/** 生成方块为4（指数2）的概率 */
export const SPAWN_FOUR_PROBABILITY = 0.1;

// ============================================
// 策略工厂的默认值
// ============================================

/** depth ≤ 0 时 expectimax-depth 使用的深度 */
export const DEFAULT_SEARCH_DEPTH = 4;

/** probability 非正时 expectimax-probability 使用的阈值 */
export const DEFAULT_PROBABILITY_THRESHOLD = 0.001;

/** expectimax-probability 的最大搜索层数 */
export const DEFAULT_PROBABILITY_MAX_DEPTH = 8;

/** monte-carlo 每个深度单位对应的模拟次数 */
export const MONTE_CARLO_ITERATIONS_PER_DEPTH = 128;

/** monte-carlo 单次模拟的最大移动数 */
export const DEFAULT_PLAYOUT_MOVE_LIMIT = 500;

/** random-trials 默认每个方向的模拟局数 */
export const DEFAULT_GAMES_PER_MOVE = 32;

/** random-trials 默认分支深度 */
export const DEFAULT_BRANCH_DEPTH = 3;

/** random-trials 固定分支宽度 */
export const RANDOM_TRIALS_WIDTH = 2;

/**
 * 策略句柄的配置
 */
export interface StrategySettings {
  /** 策略类型 */
  type: string;
  /** 启发式名称 */
  heuristic: string;
  /** 搜索深度 */
  depth: number;
  /** 概率阈值 */
  probability: number;
  /** 模拟次数 */
  trials: number;
}

/**
 * 默认策略配置
 */
export const DEFAULT_STRATEGY_SETTINGS: Readonly<StrategySettings> = Object.freeze({
  type: 'expectimax-depth',
  heuristic: 'corner',
  depth: 4,
  probability: 0.0025,
  trials: 256,
});
