import 'dotenv/config';
import process from 'node:process';
import { ConnectionSession } from '@/application/session/ConnectionSession';
import { LastPriceUsecase } from '@/application/usecases/LastPriceUsecase';
import { OrderManager } from '@/application/usecases/OrderManager';
import { bybitPrivateStreamUrl, bybitPublicStreamUrl, bybitRestUrl } from '@/infra/adapters/bybit/BybitEndpoints';
import { BybitFrameCodec } from '@/infra/adapters/bybit/BybitFrameCodec';
import { mapOrderUpdates, mapTicker } from '@/infra/adapters/bybit/BybitPayloadMapper';
import { BybitRestClient } from '@/infra/adapters/bybit/BybitRestClient';
import { BybitTopics } from '@/infra/adapters/bybit/BybitTopics';
import { loadConfig } from '@/infra/config/loadConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { RedisRecordStore } from '@/infra/redis/RedisRecordStore';
import { WsConnector } from '@/infra/websocket/WsConnector';

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: 接続の挙動やペイロードの解釈は main.ts に持ち込まず、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const config = loadConfig(process.env);
  const logger = LoggerFactory.create();
  const metricsCollector = new PrometheusMetricsCollector();

  const metricsServer =
    config.metricsPort === undefined ? undefined : new MetricsServer(metricsCollector, config.metricsPort, logger);
  metricsServer?.start();

  // インフラ層: レコードストア（注文・ティッカー）
  const store = new RedisRecordStore(config.redisUrl, { prefix: 'stream-session', logger, metricsCollector });
  const connector = new WsConnector(logger);

  const sessionDefaults = {
    connector,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    connectTimeoutMs: config.connectTimeoutMs,
    reconnect: config.reconnect,
    logger,
    metricsCollector,
  };

  // 公開チャネル: ティッカー
  const publicSession = new ConnectionSession({
    ...sessionDefaults,
    name: 'public',
    url: bybitPublicStreamUrl({ testnet: config.testnet, category: config.category }),
    codec: new BybitFrameCodec(),
  });
  const sessions = [publicSession];

  const lastPrice = new LastPriceUsecase({
    subscriber: publicSession,
    store,
    tickerTopic: BybitTopics.ticker,
    parseTicker: mapTicker,
    logger,
  });
  lastPrice.track(config.symbols);

  // 非公開チャネル: 認証情報があるときだけ注文を追跡する
  if (config.credentials) {
    const privateSession = new ConnectionSession({
      ...sessionDefaults,
      name: 'private',
      url: bybitPrivateStreamUrl(config.testnet),
      codec: new BybitFrameCodec({ credentials: config.credentials }),
    });
    sessions.push(privateSession);

    const orderManager = new OrderManager({
      gateway: new BybitRestClient({
        baseUrl: bybitRestUrl(config.testnet),
        ...config.credentials,
        category: config.category,
        logger,
      }),
      store,
      subscriber: privateSession,
      orderTopic: BybitTopics.order,
      parseOrderUpdates: mapOrderUpdates,
      category: config.category,
      logger,
    });
    orderManager.startTracking();
  } else {
    logger.info('No API credentials configured, order tracking disabled');
  }

  for (const session of sessions) {
    session.onError((error) => {
      logger.error('Session error', { session: session.name, err: error });
    });
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    // SIGINT/SIGTERM で全セッションを閉じ、Redis とメトリクスサーバーも停止する。
    for (const session of sessions) {
      session.close();
    }
    await store.close();
    await metricsServer?.stop();
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Failed to shut down cleanly', { err: error });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  // すべてのセッションを並列で接続する。購読は接続確立時にリプレイされる。
  await Promise.all(sessions.map((session) => session.connect()));
  logger.info('Sessions connected', { sessions: sessions.map((session) => session.name), symbols: config.symbols });
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to bootstrap stream session', { err: error });
  process.exit(1);
});
