import type { DataFrame } from './Frame';

/**
 * 購読ハンドラ。同期的かつ短時間で終わることが前提（受信ループを止めない）。
 * Promise を返してもよいが待たれない。reject はログに記録される。
 * ペイロードは取引所の生データなので、型の絞り込みはハンドラ側で行う。
 */
export type TopicHandler = (data: unknown, frame: DataFrame) => void | Promise<void>;

/**
 * 購読エントリ。購読解除しても削除せず active=false にする。
 */
export interface Subscription {
  readonly topic: string;
  handler: TopicHandler;
  /** 購読したい状態かどうか（再接続時のリプレイ対象） */
  active: boolean;
  readonly createdAt: number;
  updatedAt: number;
  deliveredCount: number;
  lastDeliveredAt: number | null;
}
