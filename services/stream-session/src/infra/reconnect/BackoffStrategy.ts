export interface BackoffOptions {
  /** 初回の遅延（ミリ秒） */
  baseDelayMs?: number;
  /** 遅延の上限（ミリ秒） */
  maxDelayMs?: number;
  /** 遅延を最大で何割短くするか（0〜1） */
  jitter?: number;
  random?: () => number;
}

/**
 * インフラ層: 指数バックオフ戦略の実装
 *
 * 遅延は base × 2^attempt を上限で頭打ちにし、ジッタで最大 jitter 割だけ短くする。
 * ジッタは短くする方向にしかかけないので、上限を超えることはない。
 */
export class BackoffStrategy {
  private attempt = 0;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitter: number;
  private readonly random: () => number;

  constructor(options: BackoffOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30000;
    this.jitter = options.jitter ?? 0.2;
    this.random = options.random ?? Math.random;

    if (this.baseDelayMs <= 0 || this.maxDelayMs < this.baseDelayMs) {
      throw new RangeError('baseDelayMs must be positive and not greater than maxDelayMs');
    }
    if (this.jitter < 0 || this.jitter > 1) {
      throw new RangeError('jitter must be between 0 and 1');
    }
  }

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   */
  getNextDelay(): number {
    const capped = Math.min(this.baseDelayMs * 2 ** this.attempt, this.maxDelayMs);
    this.attempt += 1;
    return Math.round(capped * (1 - this.jitter * this.random()));
  }

  /**
   * バックオフカウンターをリセットする。
   * 接続成功時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }

  get attempts(): number {
    return this.attempt;
  }
}
