import type { Mock } from 'vitest';

/**
 * vi.mock('ws') で差し替えたソケットをテストから操作するためのハンドル
 */
export interface FakeWsSocket {
  url: string;
  options?: { handshakeTimeout?: number };
  readyState: number;
  send: Mock<(data: string) => void>;
  close: Mock<(code?: number, reason?: string) => void>;
  terminate: Mock<() => void>;
  emit(event: string, ...args: unknown[]): boolean;
  listenerCount(event: string): number;
}
