import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * アプリケーション全体で同じロガーインスタンスを使うためのシングルトン。
 * 明示的に configure() されていなければ環境変数から作る。
 *
 * 環境変数:
 * - `LOG_LEVEL`: ログレベル（debug, info, warn, error）。デフォルトは `info`
 * - `NODE_ENV`: production の場合は JSON 形式、それ以外は pretty 形式
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  static create(): Logger {
    if (LoggerFactory.instance === null) {
      LoggerFactory.instance = new PinoLogger({
        level: process.env.LOG_LEVEL ?? 'info',
        pretty: process.env.NODE_ENV !== 'production',
        base: { service: 'market-engine' },
      });
    }
    return LoggerFactory.instance;
  }

  /**
   * 読み込んだ設定でロガーを作り直す（起動時に 1 回だけ呼ぶ）
   */
  static configure(options: { level: string; pretty: boolean }): Logger {
    LoggerFactory.instance = new PinoLogger({ ...options, base: { service: 'market-engine' } });
    return LoggerFactory.instance;
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
  }
}

export { LoggerFactory };
