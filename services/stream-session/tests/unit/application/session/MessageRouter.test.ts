import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { FrameCodec } from '@/application/interfaces/FrameCodec';
import { type MessageRouterHooks, MessageRouter } from '@/application/session/MessageRouter';
import { SubscriptionRegistry } from '@/application/session/SubscriptionRegistry';
import { HandlerError, MalformedFrameError, SubscriptionRejectedError } from '@/domain/errors/SessionErrors';
import { BybitFrameCodec } from '@/infra/adapters/bybit/BybitFrameCodec';

/**
 * 単体テスト: MessageRouter
 *
 * - データフレームは active なハンドラにだけ渡す
 * - ハンドラの例外・reject は閉じ込めてログに残す
 * - 不正なフレームは捨てる（受信としては数える）
 * - 購読応答は送信順（FIFO）で突き合わせる
 */
describe('MessageRouter', () => {
  let registry: SubscriptionRegistry;
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;
  let hooks: Required<MessageRouterHooks>;
  let router: MessageRouter;

  const tickerFrame = (ts = 1700000000000) =>
    JSON.stringify({ topic: 'tickers.BTCUSDT', data: { symbol: 'BTCUSDT', lastPrice: '65000' }, ts });

  beforeEach(() => {
    registry = new SubscriptionRegistry();
    loggerMock = new LoggerMock();
    metricsMock = new MetricsCollectorMock();
    hooks = {
      onTraffic: vi.fn(),
      onPong: vi.fn(),
      onAuth: vi.fn(),
      onSubscriptionRejected: vi.fn(),
    };
    router = new MessageRouter(registry, new BybitFrameCodec(), {
      sessionName: 'public',
      logger: loggerMock,
      metricsCollector: metricsMock,
      hooks,
    });
  });

  describe('データフレーム', () => {
    it('active なハンドラに (data, frame) を渡す', () => {
      const handler = vi.fn();
      registry.upsert('tickers.BTCUSDT', handler);

      router.route(tickerFrame());

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(
        { symbol: 'BTCUSDT', lastPrice: '65000' },
        {
          kind: 'data',
          topic: 'tickers.BTCUSDT',
          data: { symbol: 'BTCUSDT', lastPrice: '65000' },
          ts: 1700000000000,
        }
      );
      expect(registry.get('tickers.BTCUSDT')).toMatchObject({ deliveredCount: 1, lastDeliveredAt: 1700000000000 });
      expect(metricsMock.incrementReceived).toHaveBeenCalledWith('public', 'data');
      expect(hooks.onTraffic).toHaveBeenCalledTimes(1);
    });

    it('無効化されたトピックのフレームは捨て、debug ログだけ残す', () => {
      const handler = vi.fn();
      registry.upsert('tickers.BTCUSDT', handler);
      registry.deactivate('tickers.BTCUSDT');

      router.route(tickerFrame());

      expect(handler).not.toHaveBeenCalled();
      expect(loggerMock.debug).toHaveBeenCalledWith('Dropped frame for topic without active subscription', {
        topic: 'tickers.BTCUSDT',
        reason: 'inactive_topic',
      });
      expect(metricsMock.incrementDropped).toHaveBeenCalledWith('public', 'inactive_topic');
      expect(loggerMock.warn).not.toHaveBeenCalled();
      expect(loggerMock.error).not.toHaveBeenCalled();
    });

    it('未登録のトピックは unknown_topic として捨てる', () => {
      router.route(tickerFrame());

      expect(metricsMock.incrementDropped).toHaveBeenCalledWith('public', 'unknown_topic');
    });
  });

  describe('ハンドラの隔離', () => {
    it('ハンドラが例外を投げても HandlerError としてログに残し、後続のフレームは配信される', () => {
      const boom = new Error('boom');
      const handler = vi.fn().mockImplementationOnce(() => {
        throw boom;
      });
      registry.upsert('tickers.BTCUSDT', handler);

      expect(() => router.route(tickerFrame(1))).not.toThrow();
      router.route(tickerFrame(2));

      expect(handler).toHaveBeenCalledTimes(2);
      expect(loggerMock.error).toHaveBeenCalledTimes(1);
      const [message, meta] = loggerMock.error.mock.calls[0];
      expect(message).toBe('Topic handler failed');
      expect(meta).toMatchObject({ topic: 'tickers.BTCUSDT', ts: 1 });
      expect(meta).toHaveProperty('err', expect.any(HandlerError));
      expect(metricsMock.incrementError).toHaveBeenCalledWith('public', 'handler_error');
    });

    it('ハンドラが返した Promise の reject もログに残す', async () => {
      registry.upsert('tickers.BTCUSDT', async () => {
        throw new Error('async boom');
      });

      router.route(tickerFrame());
      await new Promise((resolve) => setImmediate(resolve));

      expect(loggerMock.error).toHaveBeenCalledWith(
        'Topic handler failed',
        expect.objectContaining({ topic: 'tickers.BTCUSDT' })
      );
    });
  });

  describe('不正なフレーム', () => {
    it('JSON として読めないフレームは警告ログを出して捨てる。受信としては数える', () => {
      router.route('not json');

      expect(hooks.onTraffic).toHaveBeenCalledTimes(1);
      expect(loggerMock.warn).toHaveBeenCalledWith(
        'Dropped malformed frame',
        expect.objectContaining({ raw: 'not json', err: expect.any(MalformedFrameError) })
      );
      expect(metricsMock.incrementError).toHaveBeenCalledWith('public', 'malformed_frame');
    });

    it('デコーダが MalformedFrameError 以外を投げても同様に捨てる', () => {
      const codec: FrameCodec = {
        encodeSubscribe: vi.fn(() => ''),
        encodeUnsubscribe: vi.fn(() => ''),
        encodePing: vi.fn(() => ''),
        encodeAuth: vi.fn(() => undefined),
        decode: vi.fn(() => {
          throw new TypeError('unexpected');
        }),
      };
      const strict = new MessageRouter(registry, codec, { logger: loggerMock });

      expect(() => strict.route('{}')).not.toThrow();
      expect(loggerMock.warn).toHaveBeenCalledWith(
        'Dropped malformed frame',
        expect.objectContaining({ err: expect.any(MalformedFrameError) })
      );
    });
  });

  describe('制御フレーム', () => {
    it('pong は reqId 付きで onPong に渡す', () => {
      router.route(JSON.stringify({ op: 'pong', req_id: 'ping-3', args: ['1700000000000'] }));

      expect(hooks.onPong).toHaveBeenCalledWith('ping-3');
      expect(metricsMock.incrementReceived).toHaveBeenCalledWith('public', 'control');
    });

    it('公開チャネル形式の pong（op: ping, ret_msg: pong）も onPong に渡す', () => {
      router.route(JSON.stringify({ success: true, ret_msg: 'pong', conn_id: 'c1', req_id: 'ping-1', op: 'ping' }));

      expect(hooks.onPong).toHaveBeenCalledWith('ping-1');
    });

    it('topic を含まない購読拒否は最も古い応答待ちのトピックに対応づける', () => {
      router.trackSubscribe('tickers.BTCUSDT');
      router.trackSubscribe('tickers.ETHUSDT');

      router.route(JSON.stringify({ success: false, ret_msg: 'error:handler not found', op: 'subscribe' }));

      expect(hooks.onSubscriptionRejected).toHaveBeenCalledTimes(1);
      const error = vi.mocked(hooks.onSubscriptionRejected).mock.calls[0][0];
      expect(error).toBeInstanceOf(SubscriptionRejectedError);
      expect(error).toMatchObject({ topic: 'tickers.BTCUSDT', reason: 'error:handler not found' });
      expect(router.pendingCount).toBe(1);
      expect(metricsMock.incrementError).toHaveBeenCalledWith('public', 'subscription_rejected');
    });

    it('応答待ちが無いときの topic を含まない購読拒否は、ログだけ残してエラーにしない', () => {
      router.route(JSON.stringify({ success: false, ret_msg: 'error:too many requests', op: 'subscribe' }));

      expect(hooks.onSubscriptionRejected).not.toHaveBeenCalled();
      expect(metricsMock.incrementError).not.toHaveBeenCalled();
      expect(loggerMock.warn).toHaveBeenCalledWith('Unexpected subscribe response', {
        kind: 'subscribe-nack',
        reason: 'error:too many requests',
      });
    });

    it('購読拒否でもレジストリのエントリは有効のまま', () => {
      registry.upsert('tickers.BTCUSDT', vi.fn());
      router.trackSubscribe('tickers.BTCUSDT');

      router.route(JSON.stringify({ success: false, ret_msg: 'rejected', op: 'subscribe' }));

      expect(registry.isActive('tickers.BTCUSDT')).toBe(true);
    });

    it('購読成功の応答で応答待ちが消化される', () => {
      router.trackSubscribe('tickers.BTCUSDT');

      router.route(JSON.stringify({ success: true, ret_msg: '', op: 'subscribe', conn_id: 'c1' }));

      expect(router.pendingCount).toBe(0);
      expect(hooks.onSubscriptionRejected).not.toHaveBeenCalled();
    });

    it('応答が topic を含む場合はそのトピックを消化する', () => {
      router.trackSubscribe('tickers.BTCUSDT');
      router.trackSubscribe('tickers.ETHUSDT');

      router.route(JSON.stringify({ success: true, op: 'subscribe', args: ['tickers.ETHUSDT'] }));

      expect(router.pendingCount).toBe(1);
    });

    it('認証応答を onAuth に渡す', () => {
      router.route(JSON.stringify({ success: true, ret_msg: '', op: 'auth', conn_id: 'c1' }));

      expect(hooks.onAuth).toHaveBeenCalledWith(true, undefined);
    });

    it('resetPending() で応答待ちを破棄する', () => {
      router.trackSubscribe('order');
      router.resetPending();

      expect(router.pendingCount).toBe(0);
    });
  });
});
