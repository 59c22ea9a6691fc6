import type { CoinBalance, OrderSide, OrderType, OrderUpdate, TickerData } from '@/domain/models/MarketData';

/**
 * 取引 API の結果。失敗は例外ではなく値で返す。
 */
export type TradingResult<T extends object> = ({ success: true } & T) | { success: false; error: string };

export interface PlaceOrderRequest {
  symbol: string;
  side: OrderSide;
  orderType: OrderType;
  qty: string;
  /** Limit 注文では必須 */
  price?: string;
  /** timeInForce, orderLinkId など、そのまま取引所へ渡す追加パラメータ */
  extra?: Record<string, string>;
}

/**
 * 取引 API のインターフェイス（インフラ層で実装される）。
 *
 * リクエスト / レスポンス型の呼び出しのみで、ストリームセッションとは接続も状態も共有しない。
 */
export interface TradingGateway {
  placeOrder(request: PlaceOrderRequest): Promise<TradingResult<{ orderId: string }>>;
  cancelOrder(symbol: string, orderId: string): Promise<TradingResult<{ orderId: string }>>;
  getOpenOrders(symbol?: string): Promise<TradingResult<{ orders: OrderUpdate[] }>>;
  getOrderHistory(symbol?: string, limit?: number): Promise<TradingResult<{ orders: OrderUpdate[] }>>;
  getBalance(coin?: string): Promise<TradingResult<{ coins: CoinBalance[]; totalEquity: string }>>;
  getTicker(symbol: string): Promise<TradingResult<{ ticker: TickerData }>>;
}
