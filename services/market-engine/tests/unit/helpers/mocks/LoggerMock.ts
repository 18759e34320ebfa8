import { type Mock, vi } from 'vitest';
import type { Logger } from '@/application/interfaces/Logger';

type LogFn = (msg: string, meta?: object) => void;

/**
 * テスト用ロガーモック
 *
 * vitest の vi.fn() でロガーメソッドの呼び出しを記録する。
 * child() は自分自身を返すので、子ロガー経由の出力もこのモックで検証できる。
 */
export class LoggerMock implements Logger {
  debug: Mock<LogFn> = vi.fn<LogFn>();
  info: Mock<LogFn> = vi.fn<LogFn>();
  warn: Mock<LogFn> = vi.fn<LogFn>();
  error: Mock<LogFn> = vi.fn<LogFn>();
  child: Mock<(bindings: object) => Logger> = vi.fn<(bindings: object) => Logger>(() => this);

  /**
   * 指定レベルで出力されたメッセージを順に返す
   */
  messages(level: 'debug' | 'info' | 'warn' | 'error'): string[] {
    return this[level].mock.calls.map(([msg]) => msg);
  }

  reset(): void {
    this.debug.mockReset();
    this.info.mockReset();
    this.warn.mockReset();
    this.error.mockReset();
    this.child.mockReset();
    this.child.mockImplementation(() => this);
  }
}
