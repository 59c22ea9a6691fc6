import type { BybitCredentials } from '@/infra/adapters/bybit/BybitFrameCodec';
import { BYBIT_CATEGORIES, type BybitCategory, isBybitCategory } from '@/infra/adapters/bybit/BybitEndpoints';
import { normalizeSymbol } from '@/infra/adapters/bybit/BybitTopics';

export interface AppConfig {
  testnet: boolean;
  category: BybitCategory;
  symbols: string[];
  redisUrl: string;
  /** 未設定なら非公開チャネル・注文追跡は起動しない */
  credentials?: BybitCredentials;
  heartbeatIntervalMs: number;
  connectTimeoutMs: number;
  reconnect: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  /** 未設定ならメトリクスサーバーは起動しない */
  metricsPort?: number;
}

type Env = Record<string, string | undefined>;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @throws {Error} 環境変数が未設定の場合
 */
function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = optionalEnv(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function booleanEnv(env: Env, key: string, fallback: boolean): boolean {
  const raw = optionalEnv(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`${key} must be true or false, got "${raw}"`);
}

/**
 * 環境変数を検証して設定を組み立てる。起動時に 1 回だけ呼ぶ。
 * @throws {Error} 必須項目の欠落・不正な値
 */
export function loadConfig(env: Env): AppConfig {
  // 安全側に倒して、明示しない限りテストネットを使う
  const testnet = booleanEnv(env, 'BYBIT_TESTNET', true);

  const category = optionalEnv(env, 'BYBIT_CATEGORY') ?? 'spot';
  if (!isBybitCategory(category)) {
    throw new Error(`Unsupported BYBIT_CATEGORY: ${category} (expected one of ${BYBIT_CATEGORIES.join(', ')})`);
  }

  const symbols = [
    ...new Set(
      requireEnv(env, 'SYMBOLS')
        .split(',')
        .map((symbol) => normalizeSymbol(symbol))
        .filter(Boolean)
    ),
  ];
  if (symbols.length === 0) {
    throw new Error('SYMBOLS must list at least one symbol');
  }

  const apiKey = optionalEnv(env, 'BYBIT_API_KEY');
  const apiSecret = optionalEnv(env, 'BYBIT_API_SECRET');
  if ((apiKey === undefined) !== (apiSecret === undefined)) {
    throw new Error('BYBIT_API_KEY and BYBIT_API_SECRET must be set together');
  }

  const baseDelayMs = positiveInt(env, 'RECONNECT_BASE_DELAY_MS', 1000);
  const maxDelayMs = positiveInt(env, 'RECONNECT_MAX_DELAY_MS', 30000);
  if (maxDelayMs < baseDelayMs) {
    throw new Error('RECONNECT_MAX_DELAY_MS must not be less than RECONNECT_BASE_DELAY_MS');
  }

  const metricsPortRaw = optionalEnv(env, 'METRICS_PORT');

  return {
    testnet,
    category,
    symbols,
    redisUrl: requireEnv(env, 'REDIS_URL'),
    credentials: apiKey && apiSecret ? { apiKey, apiSecret } : undefined,
    heartbeatIntervalMs: positiveInt(env, 'HEARTBEAT_INTERVAL_MS', 20000),
    connectTimeoutMs: positiveInt(env, 'CONNECT_TIMEOUT_MS', 10000),
    reconnect: {
      maxAttempts: positiveInt(env, 'RECONNECT_MAX_ATTEMPTS', 10),
      baseDelayMs,
      maxDelayMs,
    },
    metricsPort: metricsPortRaw === undefined ? undefined : positiveInt(env, 'METRICS_PORT', 0),
  };
}
