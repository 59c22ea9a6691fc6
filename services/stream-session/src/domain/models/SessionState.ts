/**
 * セッション状態。送信可否の唯一の判断基準になる。
 *
 * disconnected --connect--> connecting --成功--> connected --切断/無応答--> reconnecting --成功--> connected
 * connecting / reconnecting --試行上限--> disconnected
 * 任意の状態 --close--> closing --> closed（終端）
 */
export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'closing' | 'closed';

export const SESSION_STATES: readonly SessionState[] = [
  'disconnected',
  'connecting',
  'connected',
  'reconnecting',
  'closing',
  'closed',
];
