import type { Logger } from '@/application/interfaces/Logger';
import { StaleConnectionError } from '@/domain/errors/SessionErrors';

export interface HeartbeatSchedulerOptions {
  /** ping の送信間隔（ミリ秒） */
  intervalMs: number;
  /** 無通信がこの倍数 × intervalMs を超えたら無応答とみなす */
  staleMultiplier?: number;
  sendPing: (reqId: string) => void;
  onStale: (error: StaleConnectionError) => void;
  /** ping に対応する pong を受けたときの往復時間 */
  onRtt?: (rttMs: number) => void;
  logger?: Logger;
  now?: () => number;
}

/**
 * アプリケーション層: ハートビート
 *
 * 責務: 一定間隔で ping を送って相手に生存を示し、受信が途絶えたことをローカルで検知する。
 *
 * タイマーは 2 本:
 * - ping タイマー: intervalMs ごとに ping を送る
 * - 無応答タイマー: 最後の受信からしきい値が経過した時刻に発火する。受信があれば残り時間で張り直す
 *
 * stop() は同期的に両方を解除するので、戻った時点で以降の ping 送信は起こらない。
 */
export class HeartbeatScheduler {
  private pingTimer: NodeJS.Timeout | null = null;
  private staleTimer: NodeJS.Timeout | null = null;
  private lastTrafficAt = 0;
  private sequence = 0;
  private outstanding: { reqId: string; sentAt: number } | null = null;
  private readonly staleAfterMs: number;
  private readonly now: () => number;

  constructor(private readonly options: HeartbeatSchedulerOptions) {
    if (options.intervalMs <= 0) {
      throw new RangeError('intervalMs must be positive');
    }
    const multiplier = options.staleMultiplier ?? 2;
    if (multiplier < 1) {
      throw new RangeError('staleMultiplier must be at least 1');
    }
    this.staleAfterMs = options.intervalMs * multiplier;
    this.now = options.now ?? (() => Date.now());
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.lastTrafficAt = this.now();
    this.outstanding = null;
    this.pingTimer = setInterval(() => this.tick(), this.options.intervalMs);
    this.armStaleTimer(this.staleAfterMs);
  }

  stop(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.staleTimer) {
      clearTimeout(this.staleTimer);
      this.staleTimer = null;
    }
    this.outstanding = null;
  }

  /**
   * 受信（データ・制御を問わない）を記録する。
   */
  recordTraffic(): void {
    this.lastTrafficAt = this.now();
  }

  recordPong(reqId?: string): void {
    this.recordTraffic();
    if (this.outstanding && reqId === this.outstanding.reqId) {
      this.options.onRtt?.(this.lastTrafficAt - this.outstanding.sentAt);
      this.outstanding = null;
    }
  }

  get running(): boolean {
    return this.pingTimer !== null;
  }

  get staleThresholdMs(): number {
    return this.staleAfterMs;
  }

  private tick(): void {
    this.sequence += 1;
    const reqId = `ping-${this.sequence}`;
    this.outstanding = { reqId, sentAt: this.now() };
    this.options.logger?.debug('Sending heartbeat', { reqId });
    this.options.sendPing(reqId);
  }

  private armStaleTimer(delay: number): void {
    this.staleTimer = setTimeout(() => this.checkStaleness(), delay);
  }

  private checkStaleness(): void {
    this.staleTimer = null;
    const silentFor = this.now() - this.lastTrafficAt;
    if (silentFor < this.staleAfterMs) {
      this.armStaleTimer(this.staleAfterMs - silentFor);
      return;
    }
    this.stop();
    this.options.onStale(new StaleConnectionError(silentFor));
  }
}
