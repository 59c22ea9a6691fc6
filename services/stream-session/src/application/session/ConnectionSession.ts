import type { FrameCodec } from '@/application/interfaces/FrameCodec';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TopicSubscriber } from '@/application/interfaces/TopicSubscriber';
import type { TransportConnection, TransportConnector } from '@/application/interfaces/Transport';
import { HeartbeatScheduler } from '@/application/session/HeartbeatScheduler';
import { MessageRouter } from '@/application/session/MessageRouter';
import { SubscriptionRegistry } from '@/application/session/SubscriptionRegistry';
import {
  AuthenticationError,
  ConnectionError,
  SessionClosedError,
  SessionError,
  type StaleConnectionError,
} from '@/domain/errors/SessionErrors';
import type { SessionState } from '@/domain/models/SessionState';
import type { Subscription, TopicHandler } from '@/domain/models/Subscription';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { ReconnectManager, type ReconnectOptions } from '@/infra/reconnect/ReconnectManager';

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 20000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

export interface ConnectionSessionOptions {
  /** ログとメトリクスに付けるセッション名（public, private など） */
  name?: string;
  url: string;
  connector: TransportConnector;
  codec: FrameCodec;
  heartbeatIntervalMs?: number;
  staleMultiplier?: number;
  /** 1 回の接続試行（認証ハンドシェイクを含む）のタイムアウト */
  connectTimeoutMs?: number;
  reconnect?: ReconnectOptions;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

export type StateListener = (state: SessionState, previous: SessionState) => void;
export type ErrorListener = (error: SessionError) => void;

type OutboundPurpose = 'subscribe' | 'unsubscribe' | 'ping' | 'auth';

interface PendingAuth {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * アプリケーション層: 取引所との常時接続セッション
 *
 * 責務:
 * - トランスポートの所有と接続 → 稼働 → 切断の状態遷移
 * - 接続確立後のハートビート開始と購読リプレイ
 * - 予期しない切断・無応答からの自動復旧（バックオフ付き再接続）
 * - 購読 API（subscribe / unsubscribe）と状態・エラーの通知
 *
 * 送信はすべて send() を同期的に通るので、送信同士が入れ替わることはない。
 * 古い接続から遅れて届いたイベントは generation の不一致で無視する。
 */
export class ConnectionSession implements TopicSubscriber {
  readonly name: string;
  private state: SessionState = 'disconnected';
  private connection: TransportConnection | null = null;
  private generation = 0;
  private connectPromise: Promise<void> | null = null;
  private pendingAuth: PendingAuth | null = null;
  private readonly connectTimeoutMs: number;
  private readonly registry = new SubscriptionRegistry();
  private readonly heartbeat: HeartbeatScheduler;
  private readonly router: MessageRouter;
  private readonly reconnectManager: ReconnectManager;
  private readonly stateListeners = new Set<StateListener>();
  private readonly errorListeners = new Set<ErrorListener>();
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  constructor(private readonly options: ConnectionSessionOptions) {
    this.name = options.name ?? 'default';
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'ConnectionSession', session: this.name });
    this.metricsCollector = options.metricsCollector;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

    this.heartbeat = new HeartbeatScheduler({
      intervalMs: options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
      staleMultiplier: options.staleMultiplier,
      sendPing: (reqId) => {
        this.send(this.options.codec.encodePing(reqId), 'ping');
      },
      onStale: (error) => this.handleStale(error),
      onRtt: (rttMs) => this.metricsCollector?.observeHeartbeatRtt(this.name, rttMs),
      logger: this.logger,
    });

    this.router = new MessageRouter(this.registry, options.codec, {
      sessionName: this.name,
      logger: this.logger,
      metricsCollector: this.metricsCollector,
      hooks: {
        onTraffic: () => this.heartbeat.recordTraffic(),
        onPong: (reqId) => this.heartbeat.recordPong(reqId),
        onAuth: (success, reason) => this.settleAuth(success, reason),
        onSubscriptionRejected: (error) => this.emitError(error),
      },
    });

    this.reconnectManager = new ReconnectManager((attempt) => this.establish(attempt), {
      ...options.reconnect,
      name: this.name,
      logger: this.logger,
      metricsCollector: this.metricsCollector,
    });
  }

  /**
   * 接続を確立する。失敗時はバックオフ付きで再試行する。
   * 接続処理中に呼ばれた場合は進行中の試行を返す。
   * @throws {ConnectionError} 試行上限に達した場合
   * @throws {SessionClosedError} セッションが閉じている、または接続中に close() された場合
   */
  async connect(): Promise<void> {
    if (this.isShuttingDown()) {
      throw new SessionClosedError();
    }
    if (this.state === 'connected') {
      return;
    }
    if (this.connectPromise) {
      return this.connectPromise;
    }
    return this.startConnecting('connecting');
  }

  /**
   * トピックを購読する。接続中なら即座に購読リクエストを送り、未接続なら次の接続時にリプレイする。
   * 既に有効なトピックはハンドラだけを差し替え、上流へは送り直さない。
   */
  subscribe(topic: string, handler: TopicHandler): void {
    if (this.isShuttingDown()) {
      throw new SessionClosedError();
    }
    if (typeof topic !== 'string' || topic.length === 0) {
      throw new TypeError('topic must be a non-empty string');
    }
    if (typeof handler !== 'function') {
      throw new TypeError('handler must be a function');
    }

    const { wasActive } = this.registry.upsert(topic, handler);
    this.metricsCollector?.setActiveSubscriptions(this.name, this.registry.activeCount);

    if (wasActive) {
      this.logger.debug('Replaced handler for active subscription', { topic });
      return;
    }
    if (this.state === 'connected') {
      this.sendSubscribe(topic);
      return;
    }
    this.logger.debug('Subscription queued until connected', { topic, state: this.state });
  }

  /**
   * 購読を解除する。エントリは削除せず無効化する。
   * @returns 有効な購読を解除した場合 true、購読していなかった場合 false
   */
  unsubscribe(topic: string): boolean {
    if (this.isShuttingDown()) {
      throw new SessionClosedError();
    }
    if (!this.registry.deactivate(topic)) {
      this.logger.debug('Not subscribed', { topic });
      return false;
    }
    this.metricsCollector?.setActiveSubscriptions(this.name, this.registry.activeCount);

    if (this.state === 'connected') {
      this.send(this.options.codec.encodeUnsubscribe(topic), 'unsubscribe');
    }
    return true;
  }

  /**
   * セッションを終了する。何度呼んでもよい。closed からは遷移しない。
   */
  close(): void {
    if (this.isShuttingDown()) {
      return;
    }
    this.transition('closing');
    this.reconnectManager.stop();
    this.failPendingAuth(new SessionClosedError());
    this.releaseTransport(true);
    this.transition('closed');
    this.logger.info('Session closed');
  }

  getState(): SessionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  /**
   * 有効な購読トピック（購読した順）
   */
  getSubscriptions(): string[] {
    return this.registry.topics();
  }

  /**
   * 購読エントリの写し（配信回数などの確認用）
   */
  getSubscription(topic: string): Readonly<Subscription> | undefined {
    return this.registry.get(topic);
  }

  /**
   * @returns 登録解除用の関数
   */
  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  /**
   * 購読拒否や自動再接続の失敗を受け取る。
   * @returns 登録解除用の関数
   */
  onError(listener: ErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  private startConnecting(state: 'connecting' | 'reconnecting'): Promise<void> {
    this.transition(state);

    const attempt: Promise<void> = this.reconnectManager
      .start()
      .then(undefined, (error: unknown) => {
        if (this.isShuttingDown()) {
          throw new SessionClosedError();
        }
        this.transition('disconnected');
        throw error instanceof ConnectionError
          ? error
          : new ConnectionError('Connection failed', 0, { cause: error });
      })
      .finally(() => {
        if (this.connectPromise === attempt) {
          this.connectPromise = null;
        }
      });

    this.connectPromise = attempt;
    return attempt;
  }

  /**
   * 1 回分の接続試行。トランスポート確立 → 認証 → connected → ハートビート開始 → リプレイ。
   */
  private async establish(attempt: number): Promise<void> {
    this.logger.info('Connecting', { url: this.options.url, attempt });
    const connection = await this.options.connector.connect(this.options.url, this.connectTimeoutMs);

    if (this.isShuttingDown()) {
      connection.removeAllListeners();
      connection.close(1000, 'session closed');
      throw new SessionClosedError();
    }

    this.generation += 1;
    const generation = this.generation;
    this.connection = connection;
    this.router.resetPending();

    connection.onMessage((data) => this.handleInbound(generation, data));
    connection.onClose((code, reason) => {
      this.handleTransportLoss(generation, new Error(`Transport closed (code=${code}${reason ? `, reason=${reason}` : ''})`));
    });
    connection.onError((error) => {
      if (generation === this.generation) {
        this.logger.warn('Transport error', { err: error });
      }
    });

    try {
      await this.authenticate();
    } catch (error) {
      if (generation === this.generation) {
        this.releaseTransport(false);
      }
      throw error;
    }

    this.transition('connected');
    this.heartbeat.start();
    this.replaySubscriptions();
    this.logger.info('Connected', { attempt, subscriptions: this.registry.activeCount });
  }

  private async authenticate(): Promise<void> {
    const frame = this.options.codec.encodeAuth();
    if (frame === undefined) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.failPendingAuth(new AuthenticationError(`Authentication timed out after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      this.pendingAuth = {
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };

      if (!this.send(frame, 'auth')) {
        this.failPendingAuth(new AuthenticationError('Failed to send auth frame'));
      }
    });
    this.logger.info('Authenticated');
  }

  private settleAuth(success: boolean, reason: string | undefined): void {
    const pending = this.pendingAuth;
    if (!pending) {
      this.logger.warn('Unexpected auth response', { success, reason });
      return;
    }
    this.pendingAuth = null;
    if (success) {
      pending.resolve();
      return;
    }
    pending.reject(new AuthenticationError(`Authentication rejected: ${reason ?? 'no reason given'}`));
  }

  private failPendingAuth(error: Error): void {
    const pending = this.pendingAuth;
    this.pendingAuth = null;
    pending?.reject(error);
  }

  private replaySubscriptions(): void {
    const entries = this.registry.activeEntries();
    for (const { topic } of entries) {
      // 送信失敗で再接続に入った場合は次の接続時にあらためてリプレイされる
      if (this.state !== 'connected') {
        return;
      }
      this.sendSubscribe(topic);
    }
    this.metricsCollector?.setActiveSubscriptions(this.name, this.registry.activeCount);
  }

  private sendSubscribe(topic: string): void {
    if (this.send(this.options.codec.encodeSubscribe(topic), 'subscribe')) {
      this.router.trackSubscribe(topic);
    }
  }

  /**
   * 送信の唯一の経路。認証フレーム以外は connected のときだけ送る。
   * @returns 送信できた場合 true
   */
  private send(data: string, purpose: OutboundPurpose): boolean {
    const connection = this.connection;
    if (!connection) {
      return false;
    }
    if (purpose !== 'auth' && this.state !== 'connected') {
      return false;
    }

    try {
      connection.send(data);
      return true;
    } catch (error) {
      this.logger.error('Failed to send frame', { purpose, err: error });
      this.metricsCollector?.incrementError(this.name, 'send_error');
      this.handleTransportLoss(this.generation, error instanceof Error ? error : new Error(String(error)));
      return false;
    }
  }

  private handleInbound(generation: number, data: string): void {
    if (generation !== this.generation || this.isShuttingDown()) {
      return;
    }
    this.router.route(data);
  }

  private handleStale(error: StaleConnectionError): void {
    this.logger.warn('Connection is stale', { silentForMs: error.silentForMs });
    this.metricsCollector?.incrementError(this.name, 'stale_connection');
    this.handleTransportLoss(this.generation, error);
  }

  private handleTransportLoss(generation: number, cause: Error): void {
    if (generation !== this.generation) {
      return;
    }

    if (this.state !== 'connected') {
      // 認証待ちの間に切れた場合は、その試行の失敗として扱う
      this.failPendingAuth(cause);
      return;
    }

    this.logger.warn('Transport lost, reconnecting', { err: cause });
    this.releaseTransport(false);
    this.metricsCollector?.incrementReconnect(this.name);

    void this.startConnecting('reconnecting').catch((error: unknown) => {
      if (error instanceof SessionClosedError) {
        return;
      }
      this.emitError(error instanceof SessionError ? error : new ConnectionError('Reconnect failed', 0, { cause: error }));
    });
  }

  /**
   * ハートビートを止め、トランスポートを手放す。以降このトランスポートのイベントは無視される。
   */
  private releaseTransport(graceful: boolean): void {
    this.heartbeat.stop();
    this.router.resetPending();
    this.generation += 1;

    const connection = this.connection;
    this.connection = null;
    if (!connection) {
      return;
    }

    connection.removeAllListeners();
    try {
      if (graceful) {
        connection.close(1000, 'client closing');
      } else {
        connection.terminate();
      }
    } catch (error) {
      this.logger.warn('Failed to release transport', { err: error });
    }
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.logger.debug('Session state changed', { from: previous, to: next });
    this.metricsCollector?.setSessionState(this.name, next);

    for (const listener of this.stateListeners) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.error('State listener failed', { err: error });
      }
    }
  }

  private emitError(error: SessionError): void {
    if (this.errorListeners.size === 0) {
      this.logger.warn('Session error without listener', { err: error });
      return;
    }
    for (const listener of this.errorListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.error('Error listener failed', { err: listenerError });
      }
    }
  }

  private isShuttingDown(): boolean {
    return this.state === 'closing' || this.state === 'closed';
  }
}
