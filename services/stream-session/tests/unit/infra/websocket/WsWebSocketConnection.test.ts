import { beforeEach, describe, expect, it, vi } from 'vitest';
import WebSocket from 'ws';
import { WsWebSocketConnection } from '@/infra/websocket/WsWebSocketConnection';
import type { FakeWsSocket } from './FakeWsSocket';

const sockets = vi.hoisted((): FakeWsSocket[] => []);

// ws をモック（EventEmitter でイベントを再現する）
vi.mock('ws', async () => {
  const { EventEmitter } = await import('node:events');
  class MockWebSocket extends EventEmitter {
    static OPEN = 1;
    readyState = 1;
    send = vi.fn<(data: string) => void>();
    close = vi.fn<(code?: number, reason?: string) => void>();
    terminate = vi.fn<() => void>();

    constructor(
      readonly url: string,
      readonly options?: { handshakeTimeout?: number }
    ) {
      super();
      sockets.push(this);
    }
  }
  return { default: MockWebSocket };
});

/**
 * 単体テスト: WsWebSocketConnection
 *
 * 優先度: 中
 * - ソケットのイベントを登録済みのコールバックへ配る
 * - 受信データのテキスト化
 * - send / close / terminate の委譲
 */
describe('WsWebSocketConnection', () => {
  let socket: FakeWsSocket;
  let connection: WsWebSocketConnection;

  beforeEach(() => {
    sockets.length = 0;
    connection = new WsWebSocketConnection(new WebSocket('wss://stream.example.test'));
    const created = sockets.at(-1);
    if (!created) {
      throw new Error('socket was not created');
    }
    socket = created;
  });

  describe('コンストラクタ', () => {
    it('ソケットのイベントを一度だけ購読する', () => {
      expect(socket.listenerCount('open')).toBe(1);
      expect(socket.listenerCount('message')).toBe(1);
      expect(socket.listenerCount('close')).toBe(1);
      expect(socket.listenerCount('error')).toBe(1);
    });
  });

  describe('onMessage()', () => {
    it('Buffer をテキストにして全コールバックへ渡す', () => {
      const callback1 = vi.fn();
      const callback2 = vi.fn();
      connection.onMessage(callback1);
      connection.onMessage(callback2);

      socket.emit('message', Buffer.from('{"op":"pong"}'));

      expect(callback1).toHaveBeenCalledWith('{"op":"pong"}');
      expect(callback2).toHaveBeenCalledWith('{"op":"pong"}');
    });

    it('分割された Buffer は連結する', () => {
      const callback = vi.fn();
      connection.onMessage(callback);

      socket.emit('message', [Buffer.from('{"op":'), Buffer.from('"pong"}')]);

      expect(callback).toHaveBeenCalledWith('{"op":"pong"}');
    });

    it('ArrayBuffer もテキストにする', () => {
      const callback = vi.fn();
      connection.onMessage(callback);

      socket.emit('message', new Uint8Array([104, 105]).buffer);

      expect(callback).toHaveBeenCalledWith('hi');
    });
  });

  describe('onOpen() / onClose() / onError()', () => {
    it('open を通知する', () => {
      const callback = vi.fn();
      connection.onOpen(callback);

      socket.emit('open');

      expect(callback).toHaveBeenCalledTimes(1);
    });

    it('close の理由を文字列にして通知する', () => {
      const callback = vi.fn();
      connection.onClose(callback);

      socket.emit('close', 1001, Buffer.from('going away'));

      expect(callback).toHaveBeenCalledWith(1001, 'going away');
    });

    it('error を通知する', () => {
      const callback = vi.fn();
      const error = new Error('socket hang up');
      connection.onError(callback);

      socket.emit('error', error);

      expect(callback).toHaveBeenCalledWith(error);
    });
  });

  describe('removeAllListeners()', () => {
    it('コールバックだけを外し、ソケットの error は引き続き受け止める', () => {
      const onMessage = vi.fn();
      const onError = vi.fn();
      connection.onMessage(onMessage);
      connection.onError(onError);

      connection.removeAllListeners();
      socket.emit('message', Buffer.from('ignored'));

      expect(() => socket.emit('error', new Error('late error'))).not.toThrow();
      expect(onMessage).not.toHaveBeenCalled();
      expect(onError).not.toHaveBeenCalled();
    });
  });

  describe('send()', () => {
    it('OPEN のときはソケットへ送信する', () => {
      connection.send('{"op":"ping"}');

      expect(socket.send).toHaveBeenCalledWith('{"op":"ping"}');
    });

    it('OPEN でなければ例外を投げる', () => {
      socket.readyState = 3;

      expect(() => connection.send('{"op":"ping"}')).toThrow('WebSocket is not open (readyState=3)');
      expect(socket.send).not.toHaveBeenCalled();
    });
  });

  describe('close() / terminate()', () => {
    it('close() の既定コードは 1000', () => {
      connection.close();
      connection.close(4000, 'bye');

      expect(socket.close).toHaveBeenNthCalledWith(1, 1000, undefined);
      expect(socket.close).toHaveBeenNthCalledWith(2, 4000, 'bye');
    });

    it('terminate() はソケットを強制終了する', () => {
      connection.terminate();

      expect(socket.terminate).toHaveBeenCalledTimes(1);
    });
  });
});
