import { vi } from 'vitest';
import type { JsonObject } from '@/domain/models/Json';
import type { RecordPredicate, RecordStore } from '@/domain/repositories/RecordStore';

/**
 * テスト用のプロセス内レコードストア。呼び出しは vi.spyOn で検証する。
 */
export class InMemoryRecordStore implements RecordStore {
  readonly collections = new Map<string, Map<string, JsonObject>>();
  private sequence = 0;

  async insert(collection: string, record: JsonObject): Promise<string> {
    this.sequence += 1;
    const id = typeof record.id === 'string' ? record.id : `record-${this.sequence}`;
    this.collectionOf(collection).set(id, { ...record, id });
    return id;
  }

  async update(collection: string, fields: JsonObject, predicate: RecordPredicate): Promise<number> {
    const records = this.collectionOf(collection);
    let count = 0;
    for (const [id, record] of records) {
      if (!predicate(record)) continue;
      records.set(id, { ...record, ...fields, id });
      count += 1;
    }
    return count;
  }

  async select(collection: string, predicate?: RecordPredicate): Promise<JsonObject[]> {
    const records = [...this.collectionOf(collection).values()];
    return predicate ? records.filter(predicate) : records;
  }

  close = vi.fn(async (): Promise<void> => {});

  private collectionOf(collection: string): Map<string, JsonObject> {
    let records = this.collections.get(collection);
    if (!records) {
      records = new Map();
      this.collections.set(collection, records);
    }
    return records;
  }
}
