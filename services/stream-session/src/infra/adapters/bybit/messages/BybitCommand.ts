/**
 * Bybit v5 WebSocket API に送信するコマンドの型定義。
 */
export interface BybitSubscribeCommand {
  op: 'subscribe';
  args: string[];
}

export interface BybitUnsubscribeCommand {
  op: 'unsubscribe';
  args: string[];
}

export interface BybitPingCommand {
  op: 'ping';
  req_id: string;
}

/**
 * args は [apiKey, expires, signature]
 */
export interface BybitAuthCommand {
  op: 'auth';
  args: [string, number, string];
}

export type BybitCommand = BybitSubscribeCommand | BybitUnsubscribeCommand | BybitPingCommand | BybitAuthCommand;
