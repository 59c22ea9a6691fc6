/**
 * Bybit のトピック名。シンボルは取引所の表記（大文字）に揃える。
 * レジストリは大文字小文字を区別するので、正規化はトピック生成時にここで行う。
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export const BybitTopics = {
  ticker: (symbol: string): string => `tickers.${normalizeSymbol(symbol)}`,
  orderbook: (symbol: string, depth = 1): string => `orderbook.${depth}.${normalizeSymbol(symbol)}`,
  trade: (symbol: string): string => `publicTrade.${normalizeSymbol(symbol)}`,
  order: 'order',
  execution: 'execution',
  position: 'position',
  wallet: 'wallet',
} as const;

/**
 * `tickers.BTCUSDT` → `BTCUSDT`
 */
export function symbolFromTopic(topic: string): string {
  const index = topic.lastIndexOf('.');
  return index >= 0 ? topic.slice(index + 1) : topic;
}
