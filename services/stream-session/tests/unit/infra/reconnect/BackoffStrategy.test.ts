import { beforeEach, describe, expect, it } from 'vitest';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';

/**
 * 単体テスト: BackoffStrategy
 *
 * 優先度1: Infrastructure層の純粋関数
 * - 指数バックオフの計算ロジック
 * - 上限での頭打ち
 * - ジッタは遅延を短くする方向にのみかかる
 * - reset() の動作確認
 */
describe('BackoffStrategy', () => {
  let strategy: BackoffStrategy;

  beforeEach(() => {
    // ジッタを 0 にして決定的にする
    strategy = new BackoffStrategy({ jitter: 0 });
  });

  describe('getNextDelay()', () => {
    it('初回は baseDelayMs (1000ms) を返す', () => {
      expect(strategy.getNextDelay()).toBe(1000);
    });

    it('指数関数的に遅延が増加する', () => {
      const delays = Array.from({ length: 5 }, () => strategy.getNextDelay());

      expect(delays).toEqual([1000, 2000, 4000, 8000, 16000]);
    });

    it('maxDelayMs (30000ms) で頭打ちになる', () => {
      const delays = Array.from({ length: 8 }, () => strategy.getNextDelay());

      expect(delays.slice(5)).toEqual([30000, 30000, 30000]);
    });

    it('attempts は呼び出し回数を返す', () => {
      strategy.getNextDelay();
      strategy.getNextDelay();

      expect(strategy.attempts).toBe(2);
    });
  });

  describe('ジッタ', () => {
    it('random() = 1 のとき jitter 割だけ短くなる', () => {
      const jittered = new BackoffStrategy({ baseDelayMs: 1000, jitter: 0.2, random: () => 1 });

      expect(jittered.getNextDelay()).toBe(800);
      expect(jittered.getNextDelay()).toBe(1600);
    });

    it('random() = 0 のときは短くならない', () => {
      const jittered = new BackoffStrategy({ baseDelayMs: 1000, jitter: 0.2, random: () => 0 });

      expect(jittered.getNextDelay()).toBe(1000);
    });

    it('ジッタがあっても上限を超えない', () => {
      const jittered = new BackoffStrategy({ baseDelayMs: 1000, maxDelayMs: 5000, jitter: 0.5, random: () => 0 });
      const delays = Array.from({ length: 6 }, () => jittered.getNextDelay());

      expect(Math.max(...delays)).toBe(5000);
    });
  });

  describe('reset()', () => {
    it('reset() 後は baseDelayMs から再開する', () => {
      strategy.getNextDelay();
      strategy.getNextDelay();
      strategy.reset();

      expect(strategy.attempts).toBe(0);
      expect(strategy.getNextDelay()).toBe(1000);
    });
  });

  describe('オプションの検証', () => {
    it('baseDelayMs が 0 以下なら RangeError', () => {
      expect(() => new BackoffStrategy({ baseDelayMs: 0 })).toThrow(RangeError);
    });

    it('maxDelayMs が baseDelayMs より小さいなら RangeError', () => {
      expect(() => new BackoffStrategy({ baseDelayMs: 2000, maxDelayMs: 1000 })).toThrow(RangeError);
    });

    it('jitter が 0〜1 の範囲外なら RangeError', () => {
      expect(() => new BackoffStrategy({ jitter: 1.5 })).toThrow('jitter must be between 0 and 1');
    });
  });
});
