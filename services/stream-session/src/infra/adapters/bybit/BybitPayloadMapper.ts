import { isRecord, readText } from '@/domain/models/Json';
import type {
  CoinBalance,
  ExecutionUpdate,
  OrderUpdate,
  PositionUpdate,
  TickerData,
  WalletUpdate,
} from '@/domain/models/MarketData';
import { symbolFromTopic } from './BybitTopics';

/**
 * インフラ層: Bybit v5 のペイロード → ドメインモデル
 *
 * 形の合わない要素は捨てる（1 件の不正で同じフレームの他の要素を失わないため）。
 */

/**
 * `tickers.<SYMBOL>` のデータ。スポットは bid1Price、デリバティブのスナップショットは bidPrice を持つことがある。
 */
export function mapTicker(data: unknown, topic: string, ts: number): TickerData | undefined {
  if (!isRecord(data)) {
    return undefined;
  }
  return {
    symbol: readText(data, 'symbol', symbolFromTopic(topic)),
    lastPrice: readText(data, 'lastPrice', '0'),
    bidPrice: readText(data, 'bid1Price', readText(data, 'bidPrice')),
    askPrice: readText(data, 'ask1Price', readText(data, 'askPrice')),
    high24h: readText(data, 'highPrice24h'),
    low24h: readText(data, 'lowPrice24h'),
    volume24h: readText(data, 'volume24h'),
    priceChange24h: readText(data, 'price24hPcnt'),
    timestamp: ts,
  };
}

/**
 * order トピック、および REST の注文一覧（result.list）の要素
 */
export function mapOrder(order: unknown): OrderUpdate | undefined {
  if (!isRecord(order)) {
    return undefined;
  }
  const orderId = readText(order, 'orderId');
  if (!orderId) {
    return undefined;
  }
  return {
    orderId,
    symbol: readText(order, 'symbol'),
    side: readText(order, 'side'),
    price: readText(order, 'price'),
    qty: readText(order, 'qty'),
    status: readText(order, 'orderStatus'),
    orderType: readText(order, 'orderType'),
    updatedTime: readText(order, 'updatedTime'),
  };
}

export function mapOrderUpdates(data: unknown): OrderUpdate[] {
  return mapList(data, mapOrder);
}

export function mapExecutions(data: unknown): ExecutionUpdate[] {
  return mapList(data, (execution) => {
    if (!isRecord(execution)) {
      return undefined;
    }
    return {
      orderId: readText(execution, 'orderId'),
      symbol: readText(execution, 'symbol'),
      side: readText(execution, 'side'),
      price: readText(execution, 'execPrice'),
      qty: readText(execution, 'execQty'),
      fee: readText(execution, 'execFee'),
      time: readText(execution, 'execTime'),
      execType: readText(execution, 'execType'),
    };
  });
}

export function mapPositions(data: unknown): PositionUpdate[] {
  return mapList(data, (position) => {
    if (!isRecord(position)) {
      return undefined;
    }
    return {
      symbol: readText(position, 'symbol'),
      side: readText(position, 'side'),
      size: readText(position, 'size'),
      entryPrice: readText(position, 'avgPrice'),
      markPrice: readText(position, 'markPrice'),
      unrealisedPnl: readText(position, 'unrealisedPnl'),
      margin: readText(position, 'positionIM'),
      leverage: readText(position, 'leverage'),
    };
  });
}

export function mapCoinBalances(data: unknown): CoinBalance[] {
  return mapList(data, (coin) => {
    if (!isRecord(coin)) {
      return undefined;
    }
    return {
      coin: readText(coin, 'coin'),
      walletBalance: readText(coin, 'walletBalance', '0'),
      equity: readText(coin, 'equity', '0'),
      usdValue: readText(coin, 'usdValue', '0'),
    };
  });
}

export function mapWallets(data: unknown): WalletUpdate[] {
  return mapList(data, (wallet) => {
    if (!isRecord(wallet)) {
      return undefined;
    }
    return {
      accountType: readText(wallet, 'accountType'),
      coins: mapCoinBalances(wallet.coin),
      time: readText(wallet, 'creationTime'),
    };
  });
}

function mapList<T>(data: unknown, map: (item: unknown) => T | undefined): T[] {
  if (!Array.isArray(data)) {
    return [];
  }
  const result: T[] = [];
  for (const item of data) {
    const mapped = map(item);
    if (mapped !== undefined) {
      result.push(mapped);
    }
  }
  return result;
}
