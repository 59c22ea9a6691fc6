import { randomUUID } from 'node:crypto';
import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { isJsonObject, type JsonObject } from '@/domain/models/Json';
import type { RecordPredicate, RecordStore } from '@/domain/repositories/RecordStore';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface RedisRecordStoreOptions {
  /** キーの接頭辞。コレクションは `<prefix>:<collection>` のハッシュになる */
  prefix?: string;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: Redis ハッシュによるレコードストア
 *
 * 責務: コレクションを 1 つのハッシュ（id → JSON 文字列）として読み書きする。
 * 件数は注文・ティッカーの規模を想定しており、select / update はハッシュ全体を読む。
 */
export class RedisRecordStore implements RecordStore {
  private readonly redis: Redis;
  private readonly prefix: string;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  /**
   * @param redisUrl Redis 接続 URL
   */
  constructor(redisUrl: string, options: RedisRecordStoreOptions = {}) {
    this.redis = new Redis(redisUrl);
    this.prefix = options.prefix ?? 'records';
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'RedisRecordStore' });
    this.metricsCollector = options.metricsCollector;
  }

  async insert(collection: string, record: JsonObject): Promise<string> {
    const id = typeof record.id === 'string' && record.id.length > 0 ? record.id : randomUUID();
    await this.track(this.redis.hset(this.key(collection), id, JSON.stringify({ ...record, id })));
    return id;
  }

  async update(collection: string, fields: JsonObject, predicate: RecordPredicate): Promise<number> {
    const key = this.key(collection);
    const records = await this.readAll(key);
    const matched = records.filter(predicate);
    if (matched.length === 0) {
      return 0;
    }

    const transaction = this.redis.multi();
    for (const record of matched) {
      const id = record.id;
      if (typeof id !== 'string') continue;
      transaction.hset(key, id, JSON.stringify({ ...record, ...fields, id }));
    }
    await this.track(transaction.exec());
    return matched.length;
  }

  async select(collection: string, predicate?: RecordPredicate): Promise<JsonObject[]> {
    const records = await this.readAll(this.key(collection));
    return predicate ? records.filter(predicate) : records;
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }

  private key(collection: string): string {
    return `${this.prefix}:${collection}`;
  }

  private async readAll(key: string): Promise<JsonObject[]> {
    const hash = await this.track(this.redis.hgetall(key));
    const records: JsonObject[] = [];
    for (const [id, value] of Object.entries(hash)) {
      const record = parseRecord(value);
      if (!record) {
        this.logger.warn('Skipped unreadable record', { key, id });
        continue;
      }
      records.push(record);
    }
    return records;
  }

  /**
   * Redis のエラーはメトリクスに記録したうえで呼び出し元へ伝播する。
   */
  private async track<T>(operation: Promise<T>): Promise<T> {
    try {
      return await operation;
    } catch (error) {
      this.metricsCollector?.incrementError('store', 'store_error');
      throw error;
    }
  }
}

function parseRecord(value: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(value);
    return isJsonObject(parsed) && typeof parsed.id === 'string' ? parsed : undefined;
  } catch {
    return undefined;
  }
}
