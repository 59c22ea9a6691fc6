import type { InboundFrame } from '@/domain/models/Frame';

/**
 * 取引所固有のフレーム形式の変換（インフラ層で実装される）。
 */
export interface FrameCodec {
  encodeSubscribe(topic: string): string;
  encodeUnsubscribe(topic: string): string;
  encodePing(reqId: string): string;

  /**
   * 接続ごとの認証フレームを生成する。
   * @returns 認証不要なチャネルでは undefined
   */
  encodeAuth(): string | undefined;

  /**
   * 受信した生テキストを分類する。
   * @throws {MalformedFrameError} 解釈できないフレームの場合
   */
  decode(raw: string): InboundFrame;
}
