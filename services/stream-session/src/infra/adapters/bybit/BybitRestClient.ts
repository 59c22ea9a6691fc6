import { createHmac } from 'node:crypto';
import type { Logger } from '@/application/interfaces/Logger';
import type { PlaceOrderRequest, TradingGateway, TradingResult } from '@/application/interfaces/TradingGateway';
import { isRecord, readNumber, readText } from '@/domain/models/Json';
import type { CoinBalance, OrderUpdate, TickerData } from '@/domain/models/MarketData';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { BybitCategory } from './BybitEndpoints';
import { mapCoinBalances, mapOrderUpdates, mapTicker } from './BybitPayloadMapper';
import { BybitTopics } from './BybitTopics';

export interface BybitRestClientOptions {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  category?: BybitCategory;
  /** 残高照会の口座種別。テストネットは UNIFIED のみ */
  accountType?: string;
  recvWindowMs?: number;
  fetch?: typeof fetch;
  now?: () => number;
  logger?: Logger;
}

type Params = Record<string, string | number | undefined>;

interface BybitResponse {
  retCode: number;
  retMsg: string;
  result: Record<string, unknown>;
}

/**
 * REST リクエストの署名: HMAC-SHA256(secret, timestamp + apiKey + recvWindow + payload) の hex。
 * payload は GET ならクエリ文字列、POST なら JSON ボディ。
 */
export function signRestRequest(
  apiSecret: string,
  timestamp: number,
  apiKey: string,
  recvWindowMs: number,
  payload: string
): string {
  return createHmac('sha256', apiSecret).update(`${timestamp}${apiKey}${recvWindowMs}${payload}`).digest('hex');
}

/**
 * インフラ層: Bybit v5 REST の取引 API
 *
 * 責務: 署名付きリクエストの組み立てと、レスポンスの TradingResult への変換。
 * 通信エラー・取引所エラーはすべて `{ success: false, error }` として返す。
 */
export class BybitRestClient implements TradingGateway {
  private readonly category: BybitCategory;
  private readonly accountType: string;
  private readonly recvWindowMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: BybitRestClientOptions) {
    this.category = options.category ?? 'spot';
    this.accountType = options.accountType ?? 'UNIFIED';
    this.recvWindowMs = options.recvWindowMs ?? 5000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => Date.now());
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'BybitRestClient' });
  }

  async placeOrder(request: PlaceOrderRequest): Promise<TradingResult<{ orderId: string }>> {
    if (request.orderType === 'Limit' && !request.price) {
      this.logger.error('Price is required for limit orders', { symbol: request.symbol });
      return { success: false, error: 'Price is required for limit orders' };
    }

    const body: Params = {
      ...request.extra,
      category: this.category,
      symbol: request.symbol,
      side: request.side,
      orderType: request.orderType,
      qty: request.qty,
      price: request.orderType === 'Limit' ? request.price : undefined,
    };
    this.logger.info('Placing order', { symbol: request.symbol, side: request.side, orderType: request.orderType });

    const response = await this.call('POST', '/v5/order/create', body);
    if (!response.success) {
      return response;
    }
    const orderId = readText(response.result, 'orderId');
    if (!orderId) {
      return { success: false, error: 'Response has no orderId' };
    }
    this.logger.info('Order placed', { orderId });
    return { success: true, orderId };
  }

  async cancelOrder(symbol: string, orderId: string): Promise<TradingResult<{ orderId: string }>> {
    this.logger.info('Cancelling order', { symbol, orderId });
    const response = await this.call('POST', '/v5/order/cancel', { category: this.category, symbol, orderId });
    if (!response.success) {
      return response;
    }
    return { success: true, orderId };
  }

  async getOpenOrders(symbol?: string): Promise<TradingResult<{ orders: OrderUpdate[] }>> {
    const response = await this.call('GET', '/v5/order/realtime', { category: this.category, symbol });
    if (!response.success) {
      return response;
    }
    return { success: true, orders: mapOrderUpdates(response.result.list) };
  }

  async getOrderHistory(symbol?: string, limit = 50): Promise<TradingResult<{ orders: OrderUpdate[] }>> {
    const response = await this.call('GET', '/v5/order/history', { category: this.category, symbol, limit });
    if (!response.success) {
      return response;
    }
    return { success: true, orders: mapOrderUpdates(response.result.list) };
  }

  async getBalance(coin?: string): Promise<TradingResult<{ coins: CoinBalance[]; totalEquity: string }>> {
    const response = await this.call('GET', '/v5/account/wallet-balance', { accountType: this.accountType, coin });
    if (!response.success) {
      return response;
    }
    const list = response.result.list;
    const account: Record<string, unknown> = Array.isArray(list) && isRecord(list[0]) ? list[0] : {};
    return {
      success: true,
      coins: mapCoinBalances(account.coin),
      totalEquity: readText(account, 'totalEquity', '0'),
    };
  }

  async getTicker(symbol: string): Promise<TradingResult<{ ticker: TickerData }>> {
    const response = await this.call('GET', '/v5/market/tickers', { category: this.category, symbol });
    if (!response.success) {
      return response;
    }
    const list = response.result.list;
    const ticker = Array.isArray(list) ? mapTicker(list[0], BybitTopics.ticker(symbol), response.time) : undefined;
    if (!ticker) {
      return { success: false, error: `No ticker data for ${symbol}` };
    }
    return { success: true, ticker };
  }

  private async call(
    method: 'GET' | 'POST',
    path: string,
    params: Params
  ): Promise<TradingResult<{ result: Record<string, unknown>; time: number }>> {
    const defined = Object.entries(params).filter(
      (entry): entry is [string, string | number] => entry[1] !== undefined
    );
    const query = new URLSearchParams(defined.map<[string, string]>(([key, value]) => [key, String(value)])).toString();
    const body = method === 'POST' ? JSON.stringify(Object.fromEntries(defined)) : undefined;
    const url = `${this.options.baseUrl}${path}${method === 'GET' && query ? `?${query}` : ''}`;

    const timestamp = this.now();
    const signature = signRestRequest(
      this.options.apiSecret,
      timestamp,
      this.options.apiKey,
      this.recvWindowMs,
      body ?? query
    );

    let payload: unknown;
    try {
      const response = await this.fetchFn(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          'X-BAPI-API-KEY': this.options.apiKey,
          'X-BAPI-TIMESTAMP': String(timestamp),
          'X-BAPI-RECV-WINDOW': String(this.recvWindowMs),
          'X-BAPI-SIGN': signature,
        },
        body,
      });
      if (!response.ok) {
        this.logger.error('Request failed', { path, status: response.status });
        return { success: false, error: `HTTP ${response.status}` };
      }
      payload = await response.json();
    } catch (error) {
      this.logger.error('Request failed', { path, err: error });
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }

    const parsed = parseResponse(payload);
    if (!parsed) {
      return { success: false, error: 'Unexpected response shape' };
    }
    if (parsed.retCode !== 0) {
      this.logger.error('Request rejected', { path, retCode: parsed.retCode, retMsg: parsed.retMsg });
      return { success: false, error: parsed.retMsg || 'Unknown error' };
    }

    const time = isRecord(payload) ? readNumber(payload, 'time') : undefined;
    return { success: true, result: parsed.result, time: time ?? timestamp };
  }
}

function parseResponse(payload: unknown): BybitResponse | undefined {
  if (!isRecord(payload)) {
    return undefined;
  }
  const retCode = readNumber(payload, 'retCode');
  if (retCode === undefined) {
    return undefined;
  }
  return {
    retCode,
    retMsg: readText(payload, 'retMsg'),
    result: isRecord(payload.result) ? payload.result : {},
  };
}
