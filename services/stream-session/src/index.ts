export type { FrameCodec } from './application/interfaces/FrameCodec';
export type { Logger } from './application/interfaces/Logger';
export type { MetricsCollector } from './application/interfaces/MetricsCollector';
export type { TopicSubscriber } from './application/interfaces/TopicSubscriber';
export type { PlaceOrderRequest, TradingGateway, TradingResult } from './application/interfaces/TradingGateway';
export type { TransportConnection, TransportConnector } from './application/interfaces/Transport';
export {
  ConnectionSession,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  type ConnectionSessionOptions,
  type ErrorListener,
  type StateListener,
} from './application/session/ConnectionSession';
export { LastPriceUsecase } from './application/usecases/LastPriceUsecase';
export { OrderManager } from './application/usecases/OrderManager';
export {
  AuthenticationError,
  ConnectionError,
  HandlerError,
  MalformedFrameError,
  SessionClosedError,
  SessionError,
  StaleConnectionError,
  SubscriptionRejectedError,
} from './domain/errors/SessionErrors';
export type { DataFrame, InboundFrame } from './domain/models/Frame';
export type * from './domain/models/MarketData';
export type { SessionState } from './domain/models/SessionState';
export type { Subscription, TopicHandler } from './domain/models/Subscription';
export type { RecordStore } from './domain/repositories/RecordStore';
export * from './infra/adapters/bybit/BybitEndpoints';
export { BybitFrameCodec, type BybitCredentials } from './infra/adapters/bybit/BybitFrameCodec';
export * from './infra/adapters/bybit/BybitPayloadMapper';
export { BybitRestClient } from './infra/adapters/bybit/BybitRestClient';
export { BybitTopics, normalizeSymbol } from './infra/adapters/bybit/BybitTopics';
export { loadConfig, type AppConfig } from './infra/config/loadConfig';
export { LoggerFactory } from './infra/logger/LoggerFactory';
export { PrometheusMetricsCollector } from './infra/metrics/PrometheusMetricsCollector';
export { RedisRecordStore } from './infra/redis/RedisRecordStore';
export { WsConnector } from './infra/websocket/WsConnector';
