import type { SessionState } from '@/domain/models/SessionState';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

export type FrameKind = 'data' | 'control';
export type DropReason = 'unknown_topic' | 'inactive_topic';
export type ErrorType =
  | 'malformed_frame'
  | 'handler_error'
  | 'subscription_rejected'
  | 'send_error'
  | 'connect_error'
  | 'stale_connection'
  | 'store_error';

/**
 * メトリクス収集インターフェース
 *
 * 責務: セッションの受信・配信・再接続状況の収集を抽象化
 */
export interface MetricsCollector {
  /**
   * 受信フレーム数をカウント
   * @param session セッション名（public, private など）
   */
  incrementReceived(session: string, kind: FrameKind): void;

  /**
   * ハンドラに届かなかったデータフレーム数をカウント
   */
  incrementDropped(session: string, reason: DropReason): void;

  incrementError(session: string, errorType: ErrorType): void;

  incrementReconnect(session: string): void;

  setSessionState(session: string, state: SessionState): void;

  setActiveSubscriptions(session: string, count: number): void;

  /**
   * ping 送信から pong 受信までの往復時間（ミリ秒）
   */
  observeHeartbeatRtt(session: string, rttMs: number): void;

  getMetrics(): Promise<string>;

  getRegistry(): MetricsRegistry;
}
