import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  /** true なら pino-pretty で人間可読形式、false なら JSON 行で出力 */
  pretty?: boolean;
  /** すべてのログ行に付与するフィールド */
  base?: Record<string, string>;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力し、
 * 本番環境では JSON 形式で出力する。
 * child() で作った子ロガーも同じクラスで包むので、呼び出し側は区別しなくてよい。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options: PinoLoggerOptions | pino.Logger = {}) {
    if (isPinoLogger(options)) {
      this.pinoLogger = options;
      return;
    }
    const level = options.level ?? 'info';
    const usePretty = options.pretty ?? process.env.NODE_ENV !== 'production';

    const baseOptions: pino.LoggerOptions = options.base ? { level, base: options.base } : { level };

    this.pinoLogger = usePretty
      ? pino({
          ...baseOptions,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
            },
          },
        })
      : pino(baseOptions);
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

function isPinoLogger(value: PinoLoggerOptions | pino.Logger): value is pino.Logger {
  return 'child' in value && typeof value.child === 'function';
}
