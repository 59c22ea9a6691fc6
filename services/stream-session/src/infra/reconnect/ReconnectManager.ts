import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConnectionError } from '@/domain/errors/SessionErrors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BackoffStrategy, type BackoffOptions } from '@/infra/reconnect/BackoffStrategy';

export interface ReconnectOptions extends BackoffOptions {
  /** 接続試行の上限（初回を含む） */
  maxAttempts?: number;
}

export interface ReconnectManagerOptions extends ReconnectOptions {
  /** ログとメトリクスに付けるセッション名 */
  name?: string;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: 再接続スケジューラ（connect 関数を受け取って再試行）
 *
 * 責務: 接続関数を成功するまでバックオフ付きで呼び出す。
 * 試行上限に達したら ConnectionError で reject する。stop() で待機中の再試行を即座に打ち切る。
 */
export class ReconnectManager {
  private readonly backoff: BackoffStrategy;
  private readonly maxAttempts: number;
  private readonly name: string;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private stopped = false;

  /**
   * @param connectFn 接続関数。引数は 1 始まりの試行回数
   */
  constructor(
    private readonly connectFn: (attempt: number) => Promise<void>,
    options: ReconnectManagerOptions = {}
  ) {
    this.backoff = new BackoffStrategy(options);
    this.maxAttempts = options.maxAttempts ?? 10;
    this.name = options.name ?? 'default';
    this.logger = options.logger ?? LoggerFactory.create();
    this.metricsCollector = options.metricsCollector;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
  }

  /**
   * 接続を試み、失敗時はバックオフ後に再試行する。
   * @throws {ConnectionError} 試行上限に達した場合、または stop() で打ち切られた場合
   */
  async start(): Promise<void> {
    this.stopped = false;
    let lastError: unknown;
    let attempts = 0;

    while (attempts < this.maxAttempts && !this.stopped) {
      attempts += 1;
      try {
        await this.connectFn(attempts);
        this.backoff.reset();
        return;
      } catch (error) {
        lastError = error;
        if (this.stopped) {
          break;
        }

        // メトリクス収集: 接続失敗
        this.metricsCollector?.incrementError(this.name, 'connect_error');

        if (attempts >= this.maxAttempts) {
          break;
        }
        const delay = this.backoff.getNextDelay();
        this.logger.warn('Connect attempt failed, retrying', {
          attempt: attempts,
          maxAttempts: this.maxAttempts,
          delayMs: delay,
          err: error,
        });
        await this.sleep(delay);
      }
    }

    this.backoff.reset();
    if (this.stopped) {
      throw new ConnectionError('Reconnect cancelled', attempts, { cause: lastError });
    }
    this.logger.error('Giving up connecting', { attempts, err: lastError });
    throw new ConnectionError(`Failed to connect after ${attempts} attempts`, attempts, { cause: lastError });
  }

  /**
   * 再接続管理を停止する。待機中の再試行はキャンセルされる。
   */
  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private sleep(delay: number): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake = resolve;
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        this.wake = null;
        resolve();
      }, delay);
    });
  }
}
