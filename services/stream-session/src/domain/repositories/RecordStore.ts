import type { JsonObject } from '@/domain/models/Json';

export type RecordPredicate = (record: JsonObject) => boolean;

/**
 * レコードストアのインターフェイス（インフラ層で実装される）。
 *
 * コレクションは id をキーにした JSON ドキュメントの集まり。
 */
export interface RecordStore {
  /**
   * レコードを保存する。`id` が文字列ならそれをキーに上書きし、無ければ採番する。
   * @returns 保存したレコードの id
   */
  insert(collection: string, record: JsonObject): Promise<string>;

  /**
   * predicate に一致するレコードに fields を上書きする。
   * @returns 更新した件数
   */
  update(collection: string, fields: JsonObject, predicate: RecordPredicate): Promise<number>;

  select(collection: string, predicate?: RecordPredicate): Promise<JsonObject[]>;

  close(): Promise<void>;
}
