export type BybitCategory = 'spot' | 'linear' | 'inverse' | 'option';

export const BYBIT_CATEGORIES: readonly BybitCategory[] = ['spot', 'linear', 'inverse', 'option'];

export interface BybitEnvironment {
  testnet: boolean;
  category: BybitCategory;
}

/**
 * 公開チャネル（相場）の WebSocket エンドポイント
 */
export function bybitPublicStreamUrl({ testnet, category }: BybitEnvironment): string {
  return `wss://${testnet ? 'stream-testnet' : 'stream'}.bybit.com/v5/public/${category}`;
}

/**
 * 非公開チャネル（注文・約定・残高）の WebSocket エンドポイント。認証が必要。
 */
export function bybitPrivateStreamUrl(testnet: boolean): string {
  return `wss://${testnet ? 'stream-testnet' : 'stream'}.bybit.com/v5/private`;
}

export function bybitRestUrl(testnet: boolean): string {
  return testnet ? 'https://api-testnet.bybit.com' : 'https://api.bybit.com';
}

export function isBybitCategory(value: string): value is BybitCategory {
  return BYBIT_CATEGORIES.some((category) => category === value);
}
