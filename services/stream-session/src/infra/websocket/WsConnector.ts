import WebSocket from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import type { TransportConnection, TransportConnector } from '@/application/interfaces/Transport';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { WsWebSocketConnection } from './WsWebSocketConnection';

/**
 * インフラ層: WebSocket 接続の確立（1 回の試行）
 *
 * 責務: 接続を開き、open まで待つ。タイムアウト・エラー・ハンドシェイク中の切断では reject する。
 * 再試行は呼び出し側（ReconnectManager）が担当する。
 */
export class WsConnector implements TransportConnector {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? LoggerFactory.create();
  }

  connect(url: string, timeoutMs: number): Promise<TransportConnection> {
    return new Promise<TransportConnection>((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: timeoutMs });
      const connection = new WsWebSocketConnection(socket);
      let settled = false;

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        connection.removeAllListeners();
        connection.terminate();
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new Error(`WebSocket connection timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      connection.onOpen(() => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        connection.removeAllListeners();
        this.logger.debug('WebSocket opened', { url });
        resolve(connection);
      });

      connection.onError((error) => {
        fail(new Error(`WebSocket connection failed: ${error.message}`, { cause: error }));
      });

      connection.onClose((code) => {
        fail(new Error(`WebSocket closed during handshake (code=${code})`));
      });
    });
  }
}
