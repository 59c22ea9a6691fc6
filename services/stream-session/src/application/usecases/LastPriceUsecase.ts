import type { Logger } from '@/application/interfaces/Logger';
import type { TopicSubscriber } from '@/application/interfaces/TopicSubscriber';
import type { TickerData } from '@/domain/models/MarketData';
import type { RecordStore } from '@/domain/repositories/RecordStore';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface LastPriceUsecaseOptions {
  subscriber: TopicSubscriber;
  store: RecordStore;
  tickerTopic: (symbol: string) => string;
  parseTicker: (data: unknown, topic: string, ts: number) => TickerData | undefined;
  collection?: string;
  logger?: Logger;
}

export type TickerListener = (ticker: TickerData) => void;

/**
 * アプリケーション層: 最終価格の追跡
 *
 * 責務: 銘柄ごとのティッカーを購読し、最新値をメモリとストア（id = シンボル）に保持する。
 */
export class LastPriceUsecase {
  private readonly latest = new Map<string, TickerData>();
  private readonly collection: string;
  private readonly logger: Logger;

  constructor(private readonly options: LastPriceUsecaseOptions) {
    this.collection = options.collection ?? 'tickers';
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'LastPriceUsecase' });
  }

  /**
   * @returns 購読したトピック
   */
  track(symbols: string[], listener?: TickerListener): string[] {
    return symbols.map((symbol) => {
      const topic = this.options.tickerTopic(symbol);
      this.options.subscriber.subscribe(topic, async (data, frame) => {
        const ticker = this.options.parseTicker(data, frame.topic, frame.ts);
        if (!ticker) {
          this.logger.debug('Ignored ticker payload', { topic: frame.topic });
          return;
        }
        this.latest.set(ticker.symbol, ticker);
        listener?.(ticker);
        await this.options.store.insert(this.collection, { ...ticker, id: ticker.symbol });
      });
      return topic;
    });
  }

  untrack(symbol: string): boolean {
    return this.options.subscriber.unsubscribe(this.options.tickerTopic(symbol));
  }

  getLastPrice(symbol: string): TickerData | undefined {
    return this.latest.get(symbol);
  }

  /**
   * 追跡中の全銘柄の最新値（シンボル順）
   */
  snapshot(): TickerData[] {
    return [...this.latest.values()].sort((a, b) => a.symbol.localeCompare(b.symbol));
  }
}
