/**
 * ドメイン層: 取引所から受け取るデータの正規化後の形
 *
 * 価格・数量は取引所が文字列で返すので、精度を落とさないよう文字列のまま保持する。
 */

export type TickerData = {
  symbol: string;
  lastPrice: string;
  bidPrice: string;
  askPrice: string;
  high24h: string;
  low24h: string;
  volume24h: string;
  /** 24 時間の変化率（取引所の表記のまま） */
  priceChange24h: string;
  timestamp: number;
};

export type OrderSide = 'Buy' | 'Sell';
export type OrderType = 'Limit' | 'Market';

/**
 * New, PartiallyFilled, Filled, Cancelled, Rejected など。取引所が増やしても受け入れられるよう文字列で持つ。
 */
export type OrderStatus = string;

export const ACTIVE_ORDER_STATUSES: readonly OrderStatus[] = ['New', 'PartiallyFilled'];

export type OrderUpdate = {
  orderId: string;
  symbol: string;
  side: string;
  price: string;
  qty: string;
  status: OrderStatus;
  orderType: string;
  updatedTime: string;
};

export type ExecutionUpdate = {
  orderId: string;
  symbol: string;
  side: string;
  price: string;
  qty: string;
  fee: string;
  time: string;
  execType: string;
};

export type PositionUpdate = {
  symbol: string;
  side: string;
  size: string;
  entryPrice: string;
  markPrice: string;
  unrealisedPnl: string;
  margin: string;
  leverage: string;
};

export type CoinBalance = {
  coin: string;
  walletBalance: string;
  equity: string;
  usdValue: string;
};

export type WalletUpdate = {
  accountType: string;
  coins: CoinBalance[];
  time: string;
};

/**
 * orders コレクションに保存する注文の記録
 */
export type OrderRecord = {
  id: string;
  orderId: string;
  symbol: string;
  side: OrderSide;
  orderType: OrderType;
  quantity: string;
  price: string | null;
  status: OrderStatus;
  category: string;
  createdAt: number;
  updatedAt: number;
};
