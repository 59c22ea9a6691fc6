/**
 * 取引所から受信したフレームを分類した型。
 * ディスパッチ後は保持しない。
 */
export type ControlFrame =
  | { kind: 'pong'; reqId?: string }
  | { kind: 'subscribe-ack'; topics: string[] }
  | { kind: 'subscribe-nack'; topics: string[]; reason: string }
  | { kind: 'unsubscribe-ack'; success: boolean; reason?: string }
  | { kind: 'auth-ack'; success: boolean; reason?: string };

export interface DataFrame<T = unknown> {
  kind: 'data';
  topic: string;
  data: T;
  /** サーバー側タイムスタンプ（エポックミリ秒） */
  ts: number;
}

export type InboundFrame = ControlFrame | DataFrame;

export function isDataFrame(frame: InboundFrame): frame is DataFrame {
  return frame.kind === 'data';
}
