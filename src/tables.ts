/**
 * 预计算行移动表
 *
 * 为所有65536种可能的行状态预计算向左（向第0列）移动的结果。
 * 向右移动通过行反转复用同一张表，上下移动通过棋盘转置复用。
 */

/** 行状态总数（4个4位方块） */
export const ROW_COUNT = 65536;

/**
 * 单行移动结果
 */
export interface RowMoveResult {
  /** 移动后的行（16位） */
  row: number;
  /** 合并得分 */
  score: number;
}

/**
 * 计算单行向左移动的结果
 * 每对相邻相同方块只合并一次，合并产生的方块在同一次移动中不再合并
 * @param row 原始行（16位，4个4位方块）
 */
export function computeRowLeft(row: number): RowMoveResult {
  const tiles = [
    (row >> 12) & 0xF,
    (row >> 8) & 0xF,
    (row >> 4) & 0xF,
    row & 0xF,
  ];

  let score = 0;
  const nonEmpty = tiles.filter(t => t !== 0);

  const merged: number[] = [];
  let i = 0;
  while (i < nonEmpty.length) {
    if (i + 1 < nonEmpty.length && nonEmpty[i] === nonEmpty[i + 1]) {
      // 4位表示上限：32768 + 32768 仍记为 32768
      const newValue = Math.min(nonEmpty[i] + 1, 0xF);
      merged.push(newValue);
      score += 1 << newValue;
      i += 2;
    } else {
      merged.push(nonEmpty[i]);
      i++;
    }
  }

  while (merged.length < 4) {
    merged.push(0);
  }

  return {
    row: (merged[0] << 12) | (merged[1] << 8) | (merged[2] << 4) | merged[3],
    score,
  };
}

/**
 * 反转行（第0列与第3列互换，第1列与第2列互换）
 */
export function reverseRow(row: number): number {
  return (
    ((row & 0xF) << 12) |
    (((row >> 4) & 0xF) << 8) |
    (((row >> 8) & 0xF) << 4) |
    ((row >> 12) & 0xF)
  );
}

/**
 * 计算行中空格的掩码：第c列为空时第c位为1
 */
export function computeEmptyMask(row: number): number {
  let mask = 0;
  for (let c = 0; c < 4; c++) {
    if (((row >> ((3 - c) * 4)) & 0xF) === 0) mask |= 1 << c;
  }
  return mask;
}

/**
 * 不可变的行移动表
 * 构建完成后只读，可被任意数量的模拟器共享。
 * 表数据只能通过查询方法读取，外部拿不到底层数组。
 */
export class TransitionTables {
  /** 向左移动后的行 */
  readonly #left: Uint16Array;

  /** 向左移动的合并得分 */
  readonly #score: Uint32Array;

  /** 原始行的空格掩码 */
  readonly #emptyMask: Uint8Array;

  private constructor(left: Uint16Array, score: Uint32Array, emptyMask: Uint8Array) {
    this.#left = left;
    this.#score = score;
    this.#emptyMask = emptyMask;
    Object.freeze(this);
  }

  /**
   * 构建完整的预计算表
   */
  static build(): TransitionTables {
    const left = new Uint16Array(ROW_COUNT);
    const score = new Uint32Array(ROW_COUNT);
    const emptyMask = new Uint8Array(ROW_COUNT);

    for (let row = 0; row < ROW_COUNT; row++) {
      const result = computeRowLeft(row);
      left[row] = result.row;
      score[row] = result.score;
      emptyMask[row] = computeEmptyMask(row);
    }

    return new TransitionTables(left, score, emptyMask);
  }

  /**
   * 向左（第0列方向）移动单行
   */
  moveLeft(row: number): number {
    return this.#left[row];
  }

  /**
   * 向右（第3列方向）移动单行：反转 -> 向左 -> 反转
   */
  moveRight(row: number): number {
    return reverseRow(this.#left[reverseRow(row)]);
  }

  /**
   * 向左移动单行的得分
   */
  scoreLeft(row: number): number {
    return this.#score[row];
  }

  /**
   * 向右移动单行的得分
   */
  scoreRight(row: number): number {
    return this.#score[reverseRow(row)];
  }

  /**
   * 原始行的空格掩码：第c列为空时第c位为1
   */
  emptyMaskOf(row: number): number {
    return this.#emptyMask[row];
  }
}

// 进程内只构建一次
let sharedTables: TransitionTables | null = null;

/**
 * 获取共享的预计算表（首次调用时构建）
 */
export function getTransitionTables(): TransitionTables {
  if (!sharedTables) {
    sharedTables = TransitionTables.build();
  }
  return sharedTables;
}
