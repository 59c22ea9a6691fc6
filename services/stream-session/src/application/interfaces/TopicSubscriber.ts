import type { TopicHandler } from '@/domain/models/Subscription';

/**
 * トピック購読の契約。ConnectionSession が実装し、ユースケースはこれだけに依存する。
 */
export interface TopicSubscriber {
  subscribe(topic: string, handler: TopicHandler): void;
  unsubscribe(topic: string): boolean;
}
