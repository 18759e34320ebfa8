import { describe, expect, it } from 'vitest';
import { BackoffStrategy } from '@/infrastructure/reconnect/BackoffStrategy';

/**
 * 単体テスト: BackoffStrategy
 *
 * - フルジッター: 遅延は [0, min(MAX, BASE * 2^attempt)) の範囲
 * - 上限（maxDelayMs）
 * - reset() の動作確認
 */
describe('BackoffStrategy', () => {
  function delays(strategy: BackoffStrategy, count: number): number[] {
    return Array.from({ length: count }, () => strategy.getNextDelay());
  }

  describe('getNextDelay()', () => {
    it('上限が 2 倍ずつ伸び、乱数を掛けた値を返す', () => {
      const strategy = new BackoffStrategy({ random: () => 0.5 });

      expect(delays(strategy, 5)).toEqual([500, 1000, 2000, 4000, 8000]);
    });

    it('maxDelayMs で頭打ちになる', () => {
      const strategy = new BackoffStrategy({ random: () => 0.5 });

      // 1000 * 2^5 = 32000 > 30000
      expect(delays(strategy, 8).slice(4)).toEqual([8000, 15000, 15000, 15000]);
    });

    it('小数部は切り捨てる', () => {
      const strategy = new BackoffStrategy({ baseDelayMs: 100, random: () => 0.999 });

      expect(delays(strategy, 2)).toEqual([99, 199]);
    });

    it('乱数が 0 なら即時に再接続する', () => {
      const strategy = new BackoffStrategy({ random: () => 0 });

      expect(delays(strategy, 3)).toEqual([0, 0, 0]);
    });

    it('既定の乱数でも [0, 上限) に収まる', () => {
      const strategy = new BackoffStrategy({ baseDelayMs: 10, maxDelayMs: 50 });

      for (const delay of delays(strategy, 20)) {
        expect(delay).toBeGreaterThanOrEqual(0);
        expect(delay).toBeLessThan(50);
      }
    });
  });

  describe('reset()', () => {
    it('reset() 後は最初の上限から再開する', () => {
      const strategy = new BackoffStrategy({ random: () => 0.5 });
      delays(strategy, 3);
      expect(strategy.attempts).toBe(3);

      strategy.reset();

      expect(strategy.attempts).toBe(0);
      expect(delays(strategy, 2)).toEqual([500, 1000]);
    });
  });
});
