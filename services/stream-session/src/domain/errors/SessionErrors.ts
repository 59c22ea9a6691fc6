/**
 * ドメイン層: セッションのエラー分類
 *
 * 呼び出し元まで伝播するのは ConnectionError と SessionClosedError のみ。
 * それ以外はメッセージ単位・ハンドラ単位で閉じ込められ、ログかエラーチャネルに流れる。
 */
export class SessionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 再試行上限に達しても接続できなかった（致命的）
 */
export class ConnectionError extends SessionError {
  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * 無通信がしきい値を超えた。内部でのみ使用し、再接続のきっかけになる。
 */
export class StaleConnectionError extends SessionError {
  constructor(readonly silentForMs: number) {
    super(`No inbound traffic for ${silentForMs}ms`);
  }
}

/**
 * 取引所が購読リクエストを拒否した。購読エントリは有効のまま残る。
 */
export class SubscriptionRejectedError extends SessionError {
  constructor(
    readonly topic: string,
    readonly reason: string
  ) {
    super(`Subscription to ${topic} rejected: ${reason}`);
  }
}

export class HandlerError extends SessionError {
  constructor(
    readonly topic: string,
    cause: unknown
  ) {
    super(`Handler for ${topic} failed`, { cause });
  }
}

export class MalformedFrameError extends SessionError {
  constructor(
    readonly raw: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Malformed frame: ${detail}`, options);
  }
}

export class AuthenticationError extends SessionError {}

export class SessionClosedError extends SessionError {
  constructor() {
    super('Session is closed');
  }
}
