import type { Logger } from '@/application/interfaces/Logger';
import type { TopicSubscriber } from '@/application/interfaces/TopicSubscriber';
import type { PlaceOrderRequest, TradingGateway, TradingResult } from '@/application/interfaces/TradingGateway';
import type { JsonObject } from '@/domain/models/Json';
import {
  ACTIVE_ORDER_STATUSES,
  type CoinBalance,
  type OrderRecord,
  type OrderUpdate,
  type TickerData,
} from '@/domain/models/MarketData';
import type { RecordStore } from '@/domain/repositories/RecordStore';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface OrderManagerOptions {
  gateway: TradingGateway;
  store: RecordStore;
  /** 注文更新を購読するセッション（非公開チャネル） */
  subscriber: TopicSubscriber;
  /** 注文更新のトピック名 */
  orderTopic: string;
  /** 注文トピックのペイロード → OrderUpdate[] */
  parseOrderUpdates: (data: unknown) => OrderUpdate[];
  collection?: string;
  category?: string;
  logger?: Logger;
  now?: () => number;
}

export type OrderUpdateListener = (update: OrderUpdate) => void;

/** 保存前に届いた更新を保持する上限。超えたら古いものから捨てる */
const MAX_EARLY_UPDATES = 1000;

/**
 * アプリケーション層: 注文管理ユースケース
 *
 * 責務: 取引 API・レコードストア・ストリームセッションを組み合わせて、注文のライフサイクルを記録する。
 * - 発注に成功した注文を New として保存
 * - 取消に成功した注文を Cancelled に更新
 * - 注文トピックの更新を受けて保存済みのステータスを追従
 *
 * 約定通知は REST の発注応答より先に届くことがある。保存と追従は 1 本の直列キューで実行し、
 * 未保存の注文への更新は保持しておいて保存時のステータスに使う。
 */
export class OrderManager {
  private readonly collection: string;
  private readonly category: string;
  private readonly logger: Logger;
  private readonly now: () => number;
  private tracking = false;
  private readonly earlyUpdates = new Map<string, OrderUpdate>();
  private storeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly options: OrderManagerOptions) {
    this.collection = options.collection ?? 'orders';
    this.category = options.category ?? 'spot';
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'OrderManager' });
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * 発注し、成功した注文をストアに保存する。
   * @throws ストアへの保存に失敗した場合（発注自体は成立している）
   */
  async placeOrder(request: PlaceOrderRequest): Promise<TradingResult<{ orderId: string }>> {
    const result = await this.options.gateway.placeOrder(request);
    if (!result.success) {
      return result;
    }

    try {
      await this.exclusive(async () => {
        const ts = this.now();
        const early = this.earlyUpdates.get(result.orderId);
        this.earlyUpdates.delete(result.orderId);
        const record: OrderRecord = {
          id: result.orderId,
          orderId: result.orderId,
          symbol: request.symbol,
          side: request.side,
          orderType: request.orderType,
          quantity: request.qty,
          price: request.price ?? null,
          status: early?.status ?? 'New',
          category: this.category,
          createdAt: ts,
          updatedAt: ts,
        };
        await this.options.store.insert(this.collection, record);
      });
    } catch (error) {
      this.logger.error('Failed to save placed order', { orderId: result.orderId, err: error });
      throw error;
    }
    this.logger.info('Order saved', { orderId: result.orderId, symbol: request.symbol });
    return result;
  }

  async cancelOrder(symbol: string, orderId: string): Promise<TradingResult<{ orderId: string }>> {
    const result = await this.options.gateway.cancelOrder(symbol, orderId);
    if (!result.success) {
      return result;
    }
    await this.updateStatus(orderId, 'Cancelled');
    this.logger.info('Order marked as cancelled', { orderId });
    return result;
  }

  /**
   * 注文トピックを購読し、更新のたびに保存済みのステータスを書き換える。
   * 購読はセッションのレジストリに残るので、再接続後も追従が続く。
   * まだ保存されていない注文への更新は、発注結果の保存時に反映する。
   */
  startTracking(listener?: OrderUpdateListener): void {
    this.options.subscriber.subscribe(this.options.orderTopic, async (data) => {
      for (const update of this.options.parseOrderUpdates(data)) {
        if (!update.status) continue;
        this.logger.info('Order status updated', { orderId: update.orderId, status: update.status });
        await this.exclusive(async () => {
          if ((await this.updateStatus(update.orderId, update.status)) === 0) {
            this.holdEarlyUpdate(update);
          }
        });
        listener?.(update);
      }
    });
    this.tracking = true;
  }

  stopTracking(): boolean {
    this.tracking = false;
    return this.options.subscriber.unsubscribe(this.options.orderTopic);
  }

  get isTracking(): boolean {
    return this.tracking;
  }

  /**
   * 未約定（New / PartiallyFilled）の注文。新しい順。
   */
  async getActiveOrders(): Promise<OrderRecord[]> {
    const records = await this.loadOrders((order) => ACTIVE_ORDER_STATUSES.includes(order.status));
    return newestFirst(records);
  }

  async getOrderHistory(symbol?: string, limit = 100): Promise<OrderRecord[]> {
    const records = await this.loadOrders((order) => symbol === undefined || order.symbol === symbol);
    return newestFirst(records).slice(0, limit);
  }

  /**
   * 取引所の未約定注文のステータスをストアに反映する。
   * @returns 更新した注文の件数
   */
  async syncWithExchange(): Promise<number> {
    const result = await this.options.gateway.getOpenOrders();
    if (!result.success) {
      this.logger.error('Failed to get orders from exchange', { error: result.error });
      return 0;
    }

    let synced = 0;
    for (const order of result.orders) {
      if (!order.status) continue;
      if ((await this.updateStatus(order.orderId, order.status)) > 0) {
        synced += 1;
      }
    }
    this.logger.info('Synced orders with exchange', { synced });
    return synced;
  }

  getBalance(coin?: string): Promise<TradingResult<{ coins: CoinBalance[]; totalEquity: string }>> {
    return this.options.gateway.getBalance(coin);
  }

  getTicker(symbol: string): Promise<TradingResult<{ ticker: TickerData }>> {
    return this.options.gateway.getTicker(symbol);
  }

  /**
   * 保存と追従の書き込みを 1 本ずつ実行する。失敗しても後続は止めない。
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.storeQueue.then(task);
    this.storeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private holdEarlyUpdate(update: OrderUpdate): void {
    this.earlyUpdates.delete(update.orderId);
    this.earlyUpdates.set(update.orderId, update);
    if (this.earlyUpdates.size > MAX_EARLY_UPDATES) {
      const oldest = this.earlyUpdates.keys().next();
      if (!oldest.done) {
        this.earlyUpdates.delete(oldest.value);
      }
    }
    this.logger.debug('Held update for unsaved order', { orderId: update.orderId, status: update.status });
  }

  private updateStatus(orderId: string, status: string): Promise<number> {
    return this.options.store.update(
      this.collection,
      { status, updatedAt: this.now() },
      (record) => record.orderId === orderId
    );
  }

  private async loadOrders(predicate: (order: OrderRecord) => boolean): Promise<OrderRecord[]> {
    const records = await this.options.store.select(this.collection);
    const orders: OrderRecord[] = [];
    for (const record of records) {
      const order = toOrderRecord(record);
      if (order && predicate(order)) {
        orders.push(order);
      }
    }
    return orders;
  }
}

function newestFirst(records: OrderRecord[]): OrderRecord[] {
  return [...records].sort((a, b) => b.createdAt - a.createdAt);
}

export function toOrderRecord(record: JsonObject): OrderRecord | undefined {
  const { id, orderId, symbol, side, orderType, quantity, price, status, category, createdAt, updatedAt } = record;
  if (
    typeof id !== 'string' ||
    typeof orderId !== 'string' ||
    typeof symbol !== 'string' ||
    (side !== 'Buy' && side !== 'Sell') ||
    (orderType !== 'Limit' && orderType !== 'Market') ||
    typeof quantity !== 'string' ||
    (typeof price !== 'string' && price !== null) ||
    typeof status !== 'string' ||
    typeof category !== 'string' ||
    typeof createdAt !== 'number' ||
    typeof updatedAt !== 'number'
  ) {
    return undefined;
  }
  return { id, orderId, symbol, side, orderType, quantity, price, status, category, createdAt, updatedAt };
}
