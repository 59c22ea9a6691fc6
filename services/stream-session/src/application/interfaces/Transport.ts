/**
 * アプリケーション層: 取引所非依存の双方向接続（インターフェース）
 *
 * 責務: セッションが使うトランスポートの契約を定義する。実装はインフラ層（ws ライブラリ）が担当。
 */
export interface TransportConnection {
  /**
   * テキストフレームを受信したときに呼ばれるコールバック
   */
  onMessage(callback: (data: string) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  onError(callback: (error: Error) => void): void;

  /**
   * フレームを送信する。接続が開いていない場合は例外を投げる。
   */
  send(data: string): void;

  /**
   * クローズハンドシェイクを開始する（正常終了）
   */
  close(code?: number, reason?: string): void;

  removeAllListeners(): void;

  /**
   * ハンドシェイクなしで接続を破棄する
   */
  terminate(): void;
}

/**
 * 接続確立の契約。1 回の試行ごとに呼ばれ、timeoutMs 以内に開かなければ reject する。
 */
export interface TransportConnector {
  connect(url: string, timeoutMs: number): Promise<TransportConnection>;
}
