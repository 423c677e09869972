/**
 * 随机数源
 *
 * 生成方块与采样类策略都通过该接口取随机数，
 * 传入固定种子即可复现整局游戏或一次决策。
 */

import { sha256 } from 'js-sha256';

/**
 * 均匀随机数源，next() 返回 [0, 1) 内的浮点数
 */
export interface Random {
  next(): number;
}

/**
 * 将字符串种子哈希为32位整数
 */
export function seedFromString(seed: string): number {
  return parseInt(sha256(seed).slice(0, 8), 16) >>> 0;
}

/**
 * 创建随机数源
 * @param seed 数字或字符串种子；省略时使用 Math.random
 */
export function createRng(seed?: number | string): Random {
  if (seed === undefined) return { next: () => Math.random() };

  const numeric = typeof seed === 'string' ? seedFromString(seed) : seed;
  if (!Number.isFinite(numeric)) return { next: () => Math.random() };

  let state = (numeric >>> 0) || 0x6d2b79f5;
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let z = state;
      z = Math.imul(z ^ (z >>> 15), z | 1);
      z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
      return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * 返回 [0, n) 内的随机整数
 */
export function randomInt(rng: Random, n: number): number {
  const value = Math.floor(rng.next() * n);
  // 部分随机源可能返回 1.0
  return value >= n ? n - 1 : value;
}

/**
 * 从非空数组中随机选择一个元素
 */
export function pickRandom<T>(rng: Random, items: readonly T[]): T {
  return items[randomInt(rng, items.length)];
}
