/**
 * 2048 位棋盘编解码
 *
 * 每个方块用4位表示（0-15对应空格到32768），整个棋盘用64位BigInt表示。
 *
 * 棋盘位置布局（从高位到低位）：
 * 位置:  0  1  2  3  4  5  6  7  8  9 10 11 12 13 14 15
 * 位:   60 56 52 48 44 40 36 32 28 24 20 16 12  8  4  0
 *
 * 方块值编码：
 * 0 = 空格
 * 1 = 2
 * 2 = 4
 * ...
 * 15 = 32768
 */

/**
 * 棋盘类型：64位整数
 * 每4位表示一个方块的指数值
 */
export type Board = bigint;

/** 棋盘格子数 */
export const BOARD_TILE_COUNT = 16;

/** 单个方块允许的最大指数 */
export const MAX_EXPONENT = 0xF;

const ROW_MASK = 0xFFFFn;
const TILE_MASK = 0xFn;

/**
 * 将任意输入值截断到合法指数范围 [0, 15]
 * 非有限值视为空格，小数向下取整
 */
export function clampExponent(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  if (value >= MAX_EXPONENT) return MAX_EXPONENT;
  return Math.floor(value);
}

/**
 * 将16个指数值打包为位棋盘
 * 越界值会被截断，不足16个的位置视为空格
 * @param tiles 按行优先排列的方块指数
 */
export function encode(tiles: ArrayLike<number>): Board {
  let board = 0n;
  for (let i = 0; i < BOARD_TILE_COUNT; i++) {
    const exp = i < tiles.length ? clampExponent(tiles[i]) : 0;
    board = (board << 4n) | BigInt(exp);
  }
  return board;
}

/**
 * 将位棋盘拆解为16个指数值
 */
export function decode(board: Board): number[] {
  const tiles: number[] = new Array(BOARD_TILE_COUNT);
  let b = board;
  for (let i = BOARD_TILE_COUNT - 1; i >= 0; i--) {
    tiles[i] = Number(b & TILE_MASK);
    b >>= 4n;
  }
  return tiles;
}

/**
 * 从位棋盘提取指定行
 * @param rowIndex 行索引（0-3）
 * @returns 16位行值，第0列位于最高的4位
 */
export function extractRow(board: Board, rowIndex: number): number {
  const shift = BigInt((3 - rowIndex) * 16);
  return Number((board >> shift) & ROW_MASK);
}

/**
 * 设置位棋盘的指定行
 */
export function setRow(board: Board, rowIndex: number, row: number): Board {
  const shift = BigInt((3 - rowIndex) * 16);
  const mask = ~(ROW_MASK << shift);
  return (board & mask) | (BigInt(row & 0xFFFF) << shift);
}

/**
 * 由4个行值组装位棋盘
 */
export function joinRows(r0: number, r1: number, r2: number, r3: number): Board {
  return (BigInt(r0) << 48n) | (BigInt(r1) << 32n) | (BigInt(r2) << 16n) | BigInt(r3);
}

/**
 * 获取指定位置的方块值（指数形式）
 * @param pos 位置（0-15）
 */
export function getTile(board: Board, pos: number): number {
  const shift = BigInt((15 - pos) * 4);
  return Number((board >> shift) & TILE_MASK);
}

/**
 * 在指定位置设置方块值
 * @param value 方块值（指数形式，1=2, 2=4, ...）
 */
export function setTile(board: Board, pos: number, value: number): Board {
  const shift = BigInt((15 - pos) * 4);
  const mask = ~(TILE_MASK << shift);
  return (board & mask) | (BigInt(clampExponent(value)) << shift);
}

/**
 * 转置棋盘（行列互换）
 *
 * 两轮掩码交换：先交换每个2x2块内的对角方块，再交换2x2块本身。
 * 转置与位置反序可交换，因此同样适用于高位在前的布局。
 */
export function transpose(board: Board): Board {
  const a1 = board & 0xF0F00F0FF0F00F0Fn;
  const a2 = board & 0x0000F0F00000F0F0n;
  const a3 = board & 0x0F0F00000F0F0000n;
  const a = a1 | (a2 << 12n) | (a3 >> 12n);
  const b1 = a & 0xFF00FF0000FF00FFn;
  const b2 = a & 0x00FF00FF00000000n;
  const b3 = a & 0x00000000FF00FF00n;
  return b1 | (b2 >> 24n) | (b3 << 24n);
}

/**
 * 统计棋盘上的空格数量
 */
export function countEmpty(board: Board): number {
  let count = 0;
  let b = board;
  for (let i = 0; i < BOARD_TILE_COUNT; i++) {
    if ((b & TILE_MASK) === 0n) count++;
    b >>= 4n;
  }
  return count;
}

/**
 * 获取所有空格位置（0-15，升序）
 */
export function getEmptyPositions(board: Board): number[] {
  const positions: number[] = [];
  for (let i = 0; i < BOARD_TILE_COUNT; i++) {
    if (getTile(board, i) === 0) positions.push(i);
  }
  return positions;
}

/**
 * 获取棋盘上的最大指数
 */
export function getMaxExponent(board: Board): number {
  let maxExp = 0;
  let b = board;
  for (let i = 0; i < BOARD_TILE_COUNT; i++) {
    const exp = Number(b & TILE_MASK);
    if (exp > maxExp) maxExp = exp;
    b >>= 4n;
  }
  return maxExp;
}

/**
 * 获取棋盘上的最大方块值
 * @returns 最大方块的实际值（2, 4, 8, ..., 32768），空棋盘为0
 */
export function getMaxTile(board: Board): number {
  const maxExp = getMaxExponent(board);
  return maxExp === 0 ? 0 : 1 << maxExp;
}

/**
 * 棋盘得分：所有方块实际值之和
 */
export function getScore(board: Board): number {
  let score = 0;
  let b = board;
  for (let i = 0; i < BOARD_TILE_COUNT; i++) {
    const exp = Number(b & TILE_MASK);
    if (exp > 0) score += 1 << exp;
    b >>= 4n;
  }
  return score;
}

/**
 * 将4x4数组转换为位棋盘
 * @param matrix 4x4数组，值为实际方块值（0, 2, 4, 8, ...）
 */
export function matrixToBoard(matrix: number[][]): Board {
  const tiles: number[] = [];
  for (let r = 0; r < 4; r++) {
    for (let c = 0; c < 4; c++) {
      const value = matrix[r]?.[c] ?? 0;
      // 将实际值转换为指数（0->0, 2->1, 4->2, 8->3, ...）
      tiles.push(value > 0 ? Math.round(Math.log2(value)) : 0);
    }
  }
  return encode(tiles);
}

/**
 * 将位棋盘转换为4x4数组，值为实际方块值
 */
export function boardToMatrix(board: Board): number[][] {
  const tiles = decode(board);
  const matrix: number[][] = [];
  for (let r = 0; r < 4; r++) {
    matrix.push(tiles.slice(r * 4, r * 4 + 4).map(exp => (exp === 0 ? 0 : 1 << exp)));
  }
  return matrix;
}

/**
 * 格式化棋盘（调试用）
 */
export function formatBoard(board: Board): string {
  const matrix = boardToMatrix(board);
  const lines = ['┌──────┬──────┬──────┬──────┐'];
  for (let r = 0; r < 4; r++) {
    const row = matrix[r].map(v => (v === 0 ? '    ' : v.toString().padStart(4)));
    lines.push(`│ ${row.join(' │ ')} │`);
    if (r < 3) lines.push('├──────┼──────┼──────┼──────┤');
  }
  lines.push('└──────┴──────┴──────┴──────┘');
  return lines.join('\n');
}
