/**
 * 2048 位棋盘引擎与走法策略
 *
 * 对外接口：棋盘编解码、移动模拟、策略构建与选择。
 * 方向编码固定为 0 = 上, 1 = 右, 2 = 下, 3 = 左。
 */

import { Board, decode, encode } from './board';

export * from './board';
export * from './config';
export * from './diagnostics';
export * from './game';
export * from './heuristics';
export * from './random';
export * from './runner';
export * from './strategies';
export * from './strategy-factory';
export * from './tables';

/**
 * 由16个方块指数构建棋盘（越界值截断到 [0, 15]）
 */
export function boardFromArray(tiles: ArrayLike<number>): Board {
  return encode(tiles);
}

/**
 * 将棋盘展开为16个方块指数
 */
export function arrayFromBoard(board: Board): number[] {
  return decode(board);
}
