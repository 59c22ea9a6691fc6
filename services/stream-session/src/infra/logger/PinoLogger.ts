import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` で人間可読形式、本番環境では JSON 形式で出力する。
 * child() は同じクラスで pino の子ロガーをラップするので、階層が深くなっても挙動は変わらない。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    if (isPinoInstance(options)) {
      this.pinoLogger = options;
      return;
    }
    this.pinoLogger = createPino(options);
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function isPinoInstance(value: PinoLoggerOptions | pino.Logger | undefined): value is pino.Logger {
  return value !== undefined && 'child' in value && typeof value.child === 'function';
}

function createPino(options?: PinoLoggerOptions): pino.Logger {
  const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
  const usePretty = options?.pretty ?? process.env.NODE_ENV !== 'production';

  if (!usePretty) {
    // 本番環境: JSON 形式で出力
    return pino({ level });
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  });
}
