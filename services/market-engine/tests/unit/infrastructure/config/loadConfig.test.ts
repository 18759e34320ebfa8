import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@/domain/errors';
import { loadConfig } from '@/infrastructure/config/loadConfig';

/**
 * 単体テスト: loadConfig
 *
 * - 既定値
 * - SYMBOLS のグループ分け
 * - 不正値は ConfigurationError（キー名付き）
 */
describe('loadConfig', () => {
  it('SYMBOLS 以外は既定値で埋める', () => {
    expect(loadConfig({ SYMBOLS: 'btcusdt, ethusdt' })).toEqual({
      env: 'development',
      logLevel: 'info',
      stream: {
        wsBaseUrl: 'wss://stream.binance.com:9443/stream',
        groups: [['BTCUSDT', 'ETHUSDT']],
        heartbeatTimeoutMs: 60_000,
        backoffBaseMs: 1000,
        backoffMaxMs: 30_000,
      },
      snapshot: {
        restBaseUrl: 'https://api.binance.com',
        limit: 1000,
        timeoutMs: 10_000,
        maxAttempts: 5,
        retryDelayMs: 1000,
        maxBufferedUpdates: 10_000,
      },
      candles: {
        intervals: [60_000, 300_000],
        dedupWindowSize: 1000,
        retention: 500,
        closeGraceMs: 2000,
      },
      signals: {
        rulesFile: 'config/rules.json',
        retention: 200,
      },
      redis: null,
      metricsPort: null,
    });
  });

  it('| で区切った銘柄はストリームごとのグループになる', () => {
    expect(loadConfig({ SYMBOLS: 'BTCUSDT,ETHUSDT|SOLUSDT' }).stream.groups).toEqual([
      ['BTCUSDT', 'ETHUSDT'],
      ['SOLUSDT'],
    ]);
  });

  it('数値・URL の環境変数を取り込む', () => {
    const config = loadConfig({
      SYMBOLS: 'BTCUSDT',
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      REDIS_URL: 'redis://localhost:6379/0',
      REDIS_STREAM: 'alerts',
      METRICS_PORT: '9100',
      MAX_SNAPSHOT_ATTEMPTS: '3',
      CANDLE_INTERVALS: '5m, 1m,1m,15s',
    });

    expect(config.env).toBe('production');
    expect(config.logLevel).toBe('debug');
    expect(config.redis).toEqual({ url: 'redis://localhost:6379/0', stream: 'alerts' });
    expect(config.metricsPort).toBe(9100);
    expect(config.snapshot.maxAttempts).toBe(3);
    expect(config.candles.intervals).toEqual([15_000, 60_000, 300_000]);
  });

  it('空文字は未設定として扱う', () => {
    const config = loadConfig({ SYMBOLS: 'BTCUSDT', LOG_LEVEL: '', METRICS_PORT: '', REDIS_URL: '' });

    expect(config.logLevel).toBe('info');
    expect(config.metricsPort).toBeNull();
    expect(config.redis).toBeNull();
  });

  describe('不正な値', () => {
    it('SYMBOLS がなければエラー', () => {
      expect(() => loadConfig({})).toThrow(ConfigurationError);
      expect(() => loadConfig({})).toThrow('invalid configuration: SYMBOLS: Required');
    });

    it('銘柄の重複はエラー', () => {
      expect(() => loadConfig({ SYMBOLS: 'BTCUSDT|btcusdt' })).toThrow(
        'invalid configuration: SYMBOLS: symbol "BTCUSDT" is listed more than once'
      );
    });

    it('銘柄に使えない文字があればエラー', () => {
      expect(() => loadConfig({ SYMBOLS: 'BTC-USDT' })).toThrow('invalid symbol "BTC-USDT"');
    });

    it('解釈できない足の長さはエラー', () => {
      expect(() => loadConfig({ SYMBOLS: 'BTCUSDT', CANDLE_INTERVALS: '1m,1d' })).toThrow(
        'invalid configuration: CANDLE_INTERVALS: invalid interval "1d" (expected e.g. 15s, 1m, 4h)'
      );
    });

    it('バックオフの上限が初期値より小さければエラー', () => {
      expect(() => loadConfig({ SYMBOLS: 'BTCUSDT', BACKOFF_MAX_MS: '500' })).toThrow(
        'invalid configuration: BACKOFF_MAX_MS: must be greater than or equal to BACKOFF_BASE_MS'
      );
    });

    it('スナップショットのレベル数が上限を超えればエラー', () => {
      expect(() => loadConfig({ SYMBOLS: 'BTCUSDT', SNAPSHOT_LIMIT: '6000' })).toThrow(/SNAPSHOT_LIMIT/);
    });

    it('数値でない値はエラー', () => {
      expect(() => loadConfig({ SYMBOLS: 'BTCUSDT', METRICS_PORT: 'http' })).toThrow(/METRICS_PORT/);
    });
  });
});
