/**
 * 诊断与日志
 *
 * 核心模块不对外抛出异常：无法识别的名称和越界参数都会回退到默认值，
 * 回退时通过警告回调报告，便于调用方排查配置问题。
 */

// ============================================
// 日志
// ============================================

/**
 * 日志接口
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/** 控制台日志 */
export const consoleLogger: Logger = {
  info: message => console.log(message),
  warn: message => console.warn(message),
};

/** 静默日志（测试或批量运行时使用） */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};

// ============================================
// 警告
// ============================================

/**
 * 警告类型
 */
export enum SolverWarningType {
  /** 未知的策略类型，已回退到 expectimax-depth */
  UNKNOWN_STRATEGY = 'unknown_strategy',
  /** 未知的启发式名称，已回退到 corner */
  UNKNOWN_HEURISTIC = 'unknown_heuristic',
  /** 非法数值参数，已替换为默认值 */
  PARAMETER_DEFAULTED = 'parameter_defaulted',
}

/**
 * 警告信息
 */
export interface SolverWarning {
  /** 警告类型 */
  type: SolverWarningType;
  /** 警告消息 */
  message: string;
  /** 发生时间 */
  timestamp: number;
  /** 上下文信息 */
  context?: Record<string, unknown>;
}

/** 警告回调 */
export type WarningHandler = (warning: SolverWarning) => void;

/**
 * 创建把警告写入日志的回调
 */
export function logWarnings(logger: Logger = consoleLogger): WarningHandler {
  return warning => logger.warn(`[${warning.type}] ${warning.message}`);
}

/**
 * 构造并派发一条警告
 */
export function reportWarning(
  onWarning: WarningHandler | undefined,
  type: SolverWarningType,
  message: string,
  context?: Record<string, unknown>
): void {
  if (!onWarning) return;
  onWarning({ type, message, timestamp: Date.now(), context });
}
