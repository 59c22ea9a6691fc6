import { createHmac } from 'node:crypto';
import type { FrameCodec } from '@/application/interfaces/FrameCodec';
import { excerpt } from '@/application/session/MessageRouter';
import { MalformedFrameError } from '@/domain/errors/SessionErrors';
import type { InboundFrame } from '@/domain/models/Frame';
import { isRecord, readString } from '@/domain/models/Json';
import type { BybitCommand } from './messages/BybitCommand';

export interface BybitCredentials {
  apiKey: string;
  apiSecret: string;
}

export interface BybitFrameCodecOptions {
  /** 指定した場合、接続ごとに認証フレームを送る（非公開チャネル用） */
  credentials?: BybitCredentials;
  /** 認証署名の有効期限（ミリ秒） */
  authExpiresInMs?: number;
  now?: () => number;
}

/**
 * 非公開チャネルの認証署名: HMAC-SHA256(secret, "GET/realtime" + expires) の hex
 */
export function signRealtimeAuth(apiSecret: string, expires: number): string {
  return createHmac('sha256', apiSecret).update(`GET/realtime${expires}`).digest('hex');
}

/**
 * インフラ層: Bybit v5 WebSocket のフレーム形式
 *
 * 責務: 購読・解除・ping・認証コマンドの生成と、受信フレームの分類。
 *
 * 受信フレームの見分け方:
 * - `topic` を持つ → データフレーム
 * - `op: "pong"`（非公開）/ `op: "ping", ret_msg: "pong"`（公開）→ ハートビート応答
 * - `op: "subscribe" | "unsubscribe" | "auth"` → 各リクエストへの応答（success / ret_msg）
 */
export class BybitFrameCodec implements FrameCodec {
  private readonly credentials?: BybitCredentials;
  private readonly authExpiresInMs: number;
  private readonly now: () => number;

  constructor(options: BybitFrameCodecOptions = {}) {
    this.credentials = options.credentials;
    this.authExpiresInMs = options.authExpiresInMs ?? 10000;
    this.now = options.now ?? (() => Date.now());
  }

  encodeSubscribe(topic: string): string {
    return encode({ op: 'subscribe', args: [topic] });
  }

  encodeUnsubscribe(topic: string): string {
    return encode({ op: 'unsubscribe', args: [topic] });
  }

  encodePing(reqId: string): string {
    return encode({ op: 'ping', req_id: reqId });
  }

  encodeAuth(): string | undefined {
    if (!this.credentials) {
      return undefined;
    }
    const expires = this.now() + this.authExpiresInMs;
    const signature = signRealtimeAuth(this.credentials.apiSecret, expires);
    return encode({ op: 'auth', args: [this.credentials.apiKey, expires, signature] });
  }

  decode(raw: string): InboundFrame {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new MalformedFrameError(excerpt(raw), 'invalid JSON', { cause: error });
    }

    if (!isRecord(parsed)) {
      throw new MalformedFrameError(excerpt(raw), 'expected a JSON object');
    }

    if ('topic' in parsed) {
      const topic = parsed.topic;
      if (typeof topic !== 'string' || topic.length === 0) {
        throw new MalformedFrameError(excerpt(raw), 'topic must be a non-empty string');
      }
      if (!('data' in parsed)) {
        throw new MalformedFrameError(excerpt(raw), `data frame for ${topic} has no data`);
      }
      const ts = typeof parsed.ts === 'number' && Number.isFinite(parsed.ts) ? parsed.ts : this.now();
      return { kind: 'data', topic, data: parsed.data, ts };
    }

    const op = readString(parsed, 'op');
    const reqId = readString(parsed, 'req_id');
    const retMsg = readString(parsed, 'ret_msg');
    const reason = retMsg ? retMsg : undefined;

    switch (op) {
      case 'pong':
        return { kind: 'pong', reqId };

      case 'ping':
        if (retMsg === 'pong' || parsed.success === true) {
          return { kind: 'pong', reqId };
        }
        throw new MalformedFrameError(excerpt(raw), 'unexpected ping frame');

      case 'subscribe': {
        const topics = readTopics(parsed.args);
        if (parsed.success === false) {
          return { kind: 'subscribe-nack', topics, reason: reason ?? 'rejected' };
        }
        return { kind: 'subscribe-ack', topics };
      }

      case 'unsubscribe':
        return { kind: 'unsubscribe-ack', success: parsed.success !== false, reason };

      case 'auth':
        return { kind: 'auth-ack', success: parsed.success === true, reason };

      case undefined:
        throw new MalformedFrameError(excerpt(raw), 'frame has neither topic nor op');

      default:
        throw new MalformedFrameError(excerpt(raw), `unknown op ${op}`);
    }
  }
}

function encode(command: BybitCommand): string {
  return JSON.stringify(command);
}

function readTopics(args: unknown): string[] {
  if (!Array.isArray(args)) {
    return [];
  }
  return args.filter((value): value is string => typeof value === 'string');
}
