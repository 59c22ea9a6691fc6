import type { Subscription, TopicHandler } from '@/domain/models/Subscription';

export interface UpsertResult {
  /** 新規エントリとして作成されたか */
  created: boolean;
  /** 呼び出し前から active だったか（true なら上流への再購読は不要） */
  wasActive: boolean;
}

export interface ActiveEntry {
  topic: string;
  handler: TopicHandler;
}

/**
 * アプリケーション層: 購読レジストリ
 *
 * 責務: 「何を購読すべきか」の唯一の情報源。接続状態とは独立して保持され、再接続をまたいで残る。
 *
 * Map の挿入順をそのまま反復順に使うので、リプレイ順は最初に購読した順で決定的になる。
 * 同じトピックを購読し直しても位置は変わらない。
 * すべての操作は同期的に完結するため、イベントループ上では読み取りが書き込み途中の状態を観測しない。
 */
export class SubscriptionRegistry {
  private readonly entries = new Map<string, Subscription>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  upsert(topic: string, handler: TopicHandler): UpsertResult {
    const ts = this.now();
    const existing = this.entries.get(topic);

    if (!existing) {
      this.entries.set(topic, {
        topic,
        handler,
        active: true,
        createdAt: ts,
        updatedAt: ts,
        deliveredCount: 0,
        lastDeliveredAt: null,
      });
      return { created: true, wasActive: false };
    }

    const wasActive = existing.active;
    existing.handler = handler;
    existing.active = true;
    existing.updatedAt = ts;
    return { created: false, wasActive };
  }

  /**
   * 購読を無効化する。エントリ自体と配信履歴は残す。
   * @returns 有効なエントリを無効化した場合 true。存在しない・既に無効なら false
   */
  deactivate(topic: string): boolean {
    const existing = this.entries.get(topic);
    if (!existing || !existing.active) {
      return false;
    }
    existing.active = false;
    existing.updatedAt = this.now();
    return true;
  }

  /**
   * エントリの写し。書き換えてもレジストリには反映されない。
   */
  get(topic: string): Readonly<Subscription> | undefined {
    const entry = this.entries.get(topic);
    return entry ? { ...entry } : undefined;
  }

  /**
   * ディスパッチ用の参照。active なエントリのハンドラのみ返す。
   */
  lookupActive(topic: string): TopicHandler | undefined {
    const entry = this.entries.get(topic);
    return entry?.active ? entry.handler : undefined;
  }

  isActive(topic: string): boolean {
    return this.entries.get(topic)?.active ?? false;
  }

  recordDelivery(topic: string, ts: number): void {
    const entry = this.entries.get(topic);
    if (!entry) {
      return;
    }
    entry.deliveredCount += 1;
    entry.lastDeliveredAt = ts;
  }

  activeEntries(): ActiveEntry[] {
    const result: ActiveEntry[] = [];
    for (const entry of this.entries.values()) {
      if (entry.active) {
        result.push({ topic: entry.topic, handler: entry.handler });
      }
    }
    return result;
  }

  topics(): string[] {
    return this.activeEntries().map((entry) => entry.topic);
  }

  get activeCount(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.active) count += 1;
    }
    return count;
  }

  get size(): number {
    return this.entries.size;
  }
}
