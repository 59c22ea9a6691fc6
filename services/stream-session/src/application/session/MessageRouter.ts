import type { FrameCodec } from '@/application/interfaces/FrameCodec';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { SubscriptionRegistry } from '@/application/session/SubscriptionRegistry';
import {
  HandlerError,
  MalformedFrameError,
  SubscriptionRejectedError,
} from '@/domain/errors/SessionErrors';
import { type ControlFrame, type DataFrame, type InboundFrame, isDataFrame } from '@/domain/models/Frame';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * ルーターからセッションへの通知
 */
export interface MessageRouterHooks {
  /** 何らかのフレームを受信した（不正なフレームも含む） */
  onTraffic?: () => void;
  onPong?: (reqId: string | undefined) => void;
  onAuth?: (success: boolean, reason: string | undefined) => void;
  onSubscriptionRejected?: (error: SubscriptionRejectedError) => void;
}

export interface MessageRouterOptions {
  sessionName?: string;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  hooks?: MessageRouterHooks;
}

const RAW_EXCERPT_LENGTH = 200;

type SubscribeResponseFrame = Extract<ControlFrame, { kind: 'subscribe-ack' | 'subscribe-nack' }>;

/**
 * アプリケーション層: 受信フレームの分類とディスパッチ
 *
 * 責務:
 * - フレームを制御フレームとデータフレームに分類する
 * - データフレームはレジストリで active なハンドラにのみ同期的に渡す
 * - ハンドラの例外・不正なフレームはここで閉じ込め、セッションには波及させない
 */
export class MessageRouter {
  /** 応答待ちの購読リクエスト（取引所は送信順に応答する） */
  private readonly pendingSubscribes: string[] = [];
  private readonly sessionName: string;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly hooks: MessageRouterHooks;

  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly codec: FrameCodec,
    options: MessageRouterOptions = {}
  ) {
    this.sessionName = options.sessionName ?? 'default';
    this.logger = options.logger ?? LoggerFactory.create();
    this.metricsCollector = options.metricsCollector;
    this.hooks = options.hooks ?? {};
  }

  /**
   * 購読リクエストの送信を記録する。応答が topic を含まない場合の突き合わせに使う。
   */
  trackSubscribe(topic: string): void {
    this.pendingSubscribes.push(topic);
  }

  /**
   * 接続が切れたら応答待ちは無効になる。
   */
  resetPending(): void {
    this.pendingSubscribes.length = 0;
  }

  get pendingCount(): number {
    return this.pendingSubscribes.length;
  }

  route(raw: string): void {
    this.hooks.onTraffic?.();

    let frame: InboundFrame;
    try {
      frame = this.codec.decode(raw);
    } catch (error) {
      const malformed =
        error instanceof MalformedFrameError
          ? error
          : new MalformedFrameError(excerpt(raw), 'decoder failed', { cause: error });
      this.logger.warn('Dropped malformed frame', { err: malformed, raw: malformed.raw });
      this.metricsCollector?.incrementError(this.sessionName, 'malformed_frame');
      return;
    }

    if (isDataFrame(frame)) {
      this.dispatch(frame);
      return;
    }
    this.metricsCollector?.incrementReceived(this.sessionName, 'control');
    this.handleControl(frame);
  }

  private dispatch(frame: DataFrame): void {
    const handler = this.registry.lookupActive(frame.topic);
    if (!handler) {
      // 購読解除とデータの行き違いは想定内なので debug に留める
      const reason = this.registry.get(frame.topic) ? 'inactive_topic' : 'unknown_topic';
      this.logger.debug('Dropped frame for topic without active subscription', { topic: frame.topic, reason });
      this.metricsCollector?.incrementDropped(this.sessionName, reason);
      return;
    }

    this.metricsCollector?.incrementReceived(this.sessionName, 'data');
    this.registry.recordDelivery(frame.topic, frame.ts);

    try {
      const result = handler(frame.data, frame);
      if (isPromiseLike(result)) {
        void result.then(undefined, (error: unknown) => this.reportHandlerError(frame, error));
      }
    } catch (error) {
      this.reportHandlerError(frame, error);
    }
  }

  private handleControl(frame: ControlFrame): void {
    switch (frame.kind) {
      case 'pong':
        this.hooks.onPong?.(frame.reqId);
        return;

      case 'subscribe-ack':
        for (const topic of this.settlePending(frame)) {
          this.logger.debug('Subscription confirmed', { topic });
        }
        return;

      case 'subscribe-nack':
        for (const topic of this.settlePending(frame)) {
          const error = new SubscriptionRejectedError(topic, frame.reason);
          this.logger.warn('Subscription rejected by venue', { topic, reason: frame.reason });
          this.metricsCollector?.incrementError(this.sessionName, 'subscription_rejected');
          this.hooks.onSubscriptionRejected?.(error);
        }
        return;

      case 'unsubscribe-ack':
        if (!frame.success) {
          this.logger.warn('Unsubscribe rejected by venue', { reason: frame.reason });
        }
        return;

      case 'auth-ack':
        this.hooks.onAuth?.(frame.success, frame.reason);
        return;
    }
  }

  /**
   * 応答に対応するトピックを決める。応答が topic を持たなければ最も古い応答待ちを採用する。
   * 対応する応答待ちが無い応答はログだけ残して捨てる。
   */
  private settlePending(frame: SubscribeResponseFrame): string[] {
    const { topics } = frame;
    if (topics.length === 0) {
      const oldest = this.pendingSubscribes.shift();
      if (oldest === undefined) {
        this.logger.warn('Unexpected subscribe response', {
          kind: frame.kind,
          reason: frame.kind === 'subscribe-nack' ? frame.reason : undefined,
        });
        return [];
      }
      return [oldest];
    }
    for (const topic of topics) {
      const index = this.pendingSubscribes.indexOf(topic);
      if (index >= 0) {
        this.pendingSubscribes.splice(index, 1);
      }
    }
    return topics;
  }

  private reportHandlerError(frame: DataFrame, cause: unknown): void {
    const error = new HandlerError(frame.topic, cause);
    this.logger.error('Topic handler failed', { topic: frame.topic, ts: frame.ts, err: error });
    this.metricsCollector?.incrementError(this.sessionName, 'handler_error');
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export function excerpt(raw: string): string {
  return raw.length > RAW_EXCERPT_LENGTH ? `${raw.slice(0, RAW_EXCERPT_LENGTH)}…` : raw;
}
