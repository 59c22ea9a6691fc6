import { vi } from 'vitest';
import type { TransportConnection, TransportConnector } from '@/application/interfaces/Transport';

/**
 * プロセス内で完結するトランスポートのフェイク
 *
 * 送信したフレームを記録し、受信・切断・エラーをテストから発生させられる。
 *
 * 使用方法:
 * ```typescript
 * const connector = new FakeConnector();
 * const session = new ConnectionSession({ url: 'wss://example.test', connector, codec });
 * await session.connect();
 * connector.last().receive({ topic: 'tickers.BTCUSDT', data: {}, ts: 1 });
 * ```
 */
export class FakeConnection implements TransportConnection {
  readonly sent: string[] = [];
  open = true;
  closedWith: { code?: number; reason?: string } | null = null;
  terminated = false;
  /** true にすると send() が例外を投げる */
  failSends = false;
  private messageCallbacks: Array<(data: string) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];

  onMessage(callback: (data: string) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  send(data: string): void {
    if (!this.open || this.failSends) {
      throw new Error('WebSocket is not open');
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.open = false;
    this.closedWith = { code, reason };
  }

  removeAllListeners(): void {
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  }

  terminate(): void {
    this.open = false;
    this.terminated = true;
  }

  /**
   * 送信済みフレームを JSON として読む
   */
  sentFrames(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }

  receive(frame: object | string): void {
    const text = typeof frame === 'string' ? frame : JSON.stringify(frame);
    for (const cb of [...this.messageCallbacks]) {
      cb(text);
    }
  }

  /**
   * 相手側からの切断
   */
  drop(code = 1006, reason = ''): void {
    this.open = false;
    for (const cb of [...this.closeCallbacks]) {
      cb(code, reason);
    }
  }

  emitError(error: Error): void {
    for (const cb of [...this.errorCallbacks]) {
      cb(error);
    }
  }

  get listenerCount(): number {
    return this.messageCallbacks.length + this.closeCallbacks.length + this.errorCallbacks.length;
  }
}

type Outcome = { kind: 'open' } | { kind: 'fail'; error: Error } | { kind: 'hold' };

export interface HeldAttempt {
  resolve: () => FakeConnection;
  reject: (error: Error) => void;
}

/**
 * 接続試行ごとの結果をキューで指定できるコネクタ。指定がなければ即座に開く。
 */
export class FakeConnector implements TransportConnector {
  readonly connections: FakeConnection[] = [];
  readonly held: HeldAttempt[] = [];
  readonly connect = vi.fn((url: string, timeoutMs: number) => this.attempt(url, timeoutMs));
  private readonly outcomes: Outcome[] = [];

  failNext(error: Error = new Error('connect ECONNREFUSED'), times = 1): this {
    for (let i = 0; i < times; i++) {
      this.outcomes.push({ kind: 'fail', error });
    }
    return this;
  }

  /**
   * 次の試行を保留にする。held から resolve / reject で完了させる。
   */
  holdNext(): this {
    this.outcomes.push({ kind: 'hold' });
    return this;
  }

  last(): FakeConnection {
    const connection = this.connections.at(-1);
    if (!connection) {
      throw new Error('No connection has been opened');
    }
    return connection;
  }

  private attempt(_url: string, _timeoutMs: number): Promise<FakeConnection> {
    const outcome = this.outcomes.shift() ?? { kind: 'open' };
    switch (outcome.kind) {
      case 'fail':
        return Promise.reject(outcome.error);
      case 'hold':
        return new Promise<FakeConnection>((resolve, reject) => {
          this.held.push({
            resolve: () => {
              const connection = this.openConnection();
              resolve(connection);
              return connection;
            },
            reject,
          });
        });
      case 'open':
        return Promise.resolve(this.openConnection());
    }
  }

  private openConnection(): FakeConnection {
    const connection = new FakeConnection();
    this.connections.push(connection);
    return connection;
  }
}
