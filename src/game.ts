/**
 * 2048 游戏模拟器
 *
 * 所有移动都通过预计算行表完成：
 * - 左移：逐行查表
 * - 右移：行反转后查表
 * - 上移/下移：转置后按左移/右移处理，再转置回来
 */

import {
  Board,
  countEmpty,
  extractRow,
  getEmptyPositions,
  getMaxTile,
  joinRows,
  matrixToBoard,
  boardToMatrix,
  setTile,
  transpose,
  formatBoard,
} from './board';
import { SPAWN_TWO_PROBABILITY } from './config';
import { createRng, Random, randomInt } from './random';
import { getTransitionTables, TransitionTables } from './tables';

/**
 * 移动方向
 * 0 = 上, 1 = 右, 2 = 下, 3 = 左
 */
export type Direction = 0 | 1 | 2 | 3;

export const Direction = {
  UP: 0,
  RIGHT: 1,
  DOWN: 2,
  LEFT: 3,
} as const;

/** 枚举顺序，同时也是平局时的优先顺序 */
export const DIRECTIONS: readonly Direction[] = [0, 1, 2, 3];

export const DIRECTION_NAMES: Record<Direction, string> = {
  0: 'up',
  1: 'right',
  2: 'down',
  3: 'left',
};

/**
 * 判断任意数值是否为合法方向
 */
export function isDirection(value: number): value is Direction {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

/**
 * 移动结果
 */
export interface MoveResult {
  board: Board;
  score: number;
}

/**
 * 游戏模拟器
 * 除了引用只读的预计算表之外没有任何状态
 */
export class GameSimulator {
  readonly tables: TransitionTables;

  constructor(tables: TransitionTables = getTransitionTables()) {
    this.tables = tables;
  }

  /**
   * 执行指定方向的移动
   * 非法方向返回原棋盘
   */
  makeMove(board: Board, direction: number): Board {
    switch (direction) {
      case Direction.UP:
        return transpose(this.moveRowsLeft(transpose(board)));
      case Direction.RIGHT:
        return this.moveRowsRight(board);
      case Direction.DOWN:
        return transpose(this.moveRowsRight(transpose(board)));
      case Direction.LEFT:
        return this.moveRowsLeft(board);
      default:
        return board;
    }
  }

  /**
   * 执行移动并返回合并得分
   */
  makeMoveWithScore(board: Board, direction: number): MoveResult {
    if (!isDirection(direction)) return { board, score: 0 };

    const vertical = direction === Direction.UP || direction === Direction.DOWN;
    const source = vertical ? transpose(board) : board;
    const toLeft = direction === Direction.UP || direction === Direction.LEFT;

    let score = 0;
    for (let r = 0; r < 4; r++) {
      const row = extractRow(source, r);
      score += toLeft ? this.tables.scoreLeft(row) : this.tables.scoreRight(row);
    }

    return { board: this.makeMove(board, direction), score };
  }

  /**
   * 检查移动是否有效（棋盘发生变化）
   */
  isValidMove(board: Board, direction: number): boolean {
    if (!isDirection(direction)) return false;
    return this.makeMove(board, direction) !== board;
  }

  /**
   * 获取所有有效方向（按枚举顺序）
   */
  legalDirections(board: Board): Direction[] {
    return DIRECTIONS.filter(direction => this.makeMove(board, direction) !== board);
  }

  /**
   * 检查游戏是否结束（四个方向都无法移动）
   */
  isGameOver(board: Board): boolean {
    for (const direction of DIRECTIONS) {
      if (this.makeMove(board, direction) !== board) return false;
    }
    return true;
  }

  /**
   * 在随机空格位置添加新方块
   * 90%概率添加2（值=1），10%概率添加4（值=2）
   * @returns 添加方块后的位棋盘，如果没有空格返回原棋盘
   */
  spawnTile(board: Board, rng: Random): Board {
    const emptyPositions = this.emptyPositions(board);
    if (emptyPositions.length === 0) return board;

    const pos = emptyPositions[randomInt(rng, emptyPositions.length)];
    const value = rng.next() < SPAWN_TWO_PROBABILITY ? 1 : 2;

    return setTile(board, pos, value);
  }

  /**
   * 通过空格掩码表获取空格位置
   */
  emptyPositions(board: Board): number[] {
    const positions: number[] = [];
    for (let r = 0; r < 4; r++) {
      const mask = this.tables.emptyMaskOf(extractRow(board, r));
      for (let c = 0; c < 4; c++) {
        if (mask & (1 << c)) positions.push(r * 4 + c);
      }
    }
    return positions;
  }

  private moveRowsLeft(board: Board): Board {
    const { tables } = this;
    return joinRows(
      tables.moveLeft(extractRow(board, 0)),
      tables.moveLeft(extractRow(board, 1)),
      tables.moveLeft(extractRow(board, 2)),
      tables.moveLeft(extractRow(board, 3)),
    );
  }

  private moveRowsRight(board: Board): Board {
    const { tables } = this;
    return joinRows(
      tables.moveRight(extractRow(board, 0)),
      tables.moveRight(extractRow(board, 1)),
      tables.moveRight(extractRow(board, 2)),
      tables.moveRight(extractRow(board, 3)),
    );
  }
}

// ============================================
// 共享模拟器与函数式接口
// ============================================

let sharedSimulator: GameSimulator | null = null;

/**
 * 获取共享模拟器（使用共享预计算表）
 */
export function getSimulator(): GameSimulator {
  if (!sharedSimulator) {
    sharedSimulator = new GameSimulator();
  }
  return sharedSimulator;
}

export function makeMove(board: Board, direction: number): Board {
  return getSimulator().makeMove(board, direction);
}

export function isValidMove(board: Board, direction: number): boolean {
  return getSimulator().isValidMove(board, direction);
}

export function isGameOver(board: Board): boolean {
  return getSimulator().isGameOver(board);
}

export function spawnTile(board: Board, rng: Random): Board {
  return getSimulator().spawnTile(board, rng);
}

// ============================================
// 游戏会话
// ============================================

/**
 * 游戏会话类
 * 封装棋盘和累计得分，提供交互式对局接口
 */
export class Game {
  board: Board;
  score: number;

  private readonly simulator: GameSimulator;
  private readonly rng: Random;

  constructor(rng: Random = createRng(), simulator: GameSimulator = getSimulator()) {
    this.board = 0n;
    this.score = 0;
    this.rng = rng;
    this.simulator = simulator;
  }

  /**
   * 初始化新游戏
   * 清空棋盘，添加2个随机方块
   */
  init(): void {
    this.board = 0n;
    this.score = 0;
    this.addRandomTile();
    this.addRandomTile();
  }

  /**
   * 执行移动（不添加新方块）
   * @returns 移动结果，包含是否成功和得分
   */
  move(direction: number): { moved: boolean; score: number } {
    const result = this.simulator.makeMoveWithScore(this.board, direction);
    if (result.board === this.board) {
      return { moved: false, score: 0 };
    }

    this.board = result.board;
    this.score += result.score;
    return { moved: true, score: result.score };
  }

  addRandomTile(): void {
    this.board = this.simulator.spawnTile(this.board, this.rng);
  }

  isGameOver(): boolean {
    return this.simulator.isGameOver(this.board);
  }

  getMaxTile(): number {
    return getMaxTile(this.board);
  }

  countEmpty(): number {
    return countEmpty(this.board);
  }

  getEmptyPositions(): number[] {
    return getEmptyPositions(this.board);
  }

  /**
   * 克隆当前游戏状态（共享随机数源）
   */
  clone(): Game {
    const game = new Game(this.rng, this.simulator);
    game.board = this.board;
    game.score = this.score;
    return game;
  }

  /**
   * 从矩阵设置棋盘状态
   * @param matrix 4x4数组，值为实际方块值
   */
  setFromMatrix(matrix: number[][], score: number = 0): void {
    this.board = matrixToBoard(matrix);
    this.score = score;
  }

  toMatrix(): number[][] {
    return boardToMatrix(this.board);
  }

  toString(): string {
    return `Score: ${this.score}\n${formatBoard(this.board)}`;
  }
}
