import WebSocket, { type RawData } from 'ws';
import type { TransportConnection } from '@/application/interfaces/Transport';

/**
 * ws ライブラリを使った WebSocket 接続の実装
 *
 * ソケットのイベントは生成時に一度だけ購読し、登録済みのコールバックへ配る。
 * removeAllListeners() はコールバックだけを外すので、ソケットの error イベントが未処理になることはない。
 */
export class WsWebSocketConnection implements TransportConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: string) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];

  constructor(private readonly socket: WebSocket) {
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: RawData) => {
      const text = toText(data);
      for (const cb of this.messageCallbacks) {
        cb(text);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      const text = reason.toString('utf-8');
      for (const cb of this.closeCallbacks) {
        cb(code, text);
      }
    });

    this.socket.on('error', (error: Error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

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
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error(`WebSocket is not open (readyState=${this.socket.readyState})`);
    }
    this.socket.send(data);
  }

  close(code = 1000, reason?: string): void {
    this.socket.close(code, reason);
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}

function toText(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}
