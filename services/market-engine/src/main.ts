import 'dotenv/config';
import process from 'node:process';
import { MarketEngine } from '@/application/MarketEngine';
import { BinanceAdapter } from '@/infrastructure/adapters/binance/BinanceAdapter';
import { BinanceMessageParser } from '@/infrastructure/adapters/binance/BinanceMessageParser';
import { BinanceSnapshotClient } from '@/infrastructure/adapters/binance/BinanceSnapshotClient';
import { loadConfig } from '@/infrastructure/config/loadConfig';
import { loadRules } from '@/infrastructure/config/loadRules';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';
import { MetricsServer } from '@/infrastructure/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infrastructure/metrics/PrometheusMetricsCollector';
import { BackoffStrategy } from '@/infrastructure/reconnect/BackoffStrategy';
import { RedisSignalSink } from '@/infrastructure/redis/RedisSignalSink';
import { LoggerSignalSink } from '@/infrastructure/sinks/LoggerSignalSink';
import { StreamClient } from '@/presentation/stream/StreamClient';

/** advanceTo() を呼ぶ間隔（ミリ秒） */
const TICK_INTERVAL_MS = 1000;

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: 受信・集計・判定のロジックは main.ts に持ち込まず、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const config = loadConfig(process.env);
  const logger = LoggerFactory.configure({ level: config.logLevel, pretty: config.env !== 'production' });
  const metricsCollector = new PrometheusMetricsCollector();
  const rules = await loadRules(config.signals.rulesFile, config.candles.intervals);

  const snapshotProvider = new BinanceSnapshotClient({
    baseUrl: config.snapshot.restBaseUrl,
    limit: config.snapshot.limit,
    timeoutMs: config.snapshot.timeoutMs,
    logger,
  });

  // SYMBOLS のグループごとに接続を分け、再接続が他の接続の配信を止めないようにする
  const parser = new BinanceMessageParser();
  const streams = config.stream.groups.map(
    (instruments, index) =>
      new StreamClient(new BinanceAdapter(config.stream.wsBaseUrl, { logger }), parser, instruments, {
        name: `stream-${index + 1}`,
        heartbeatTimeoutMs: config.stream.heartbeatTimeoutMs,
        backoff: new BackoffStrategy({
          baseDelayMs: config.stream.backoffBaseMs,
          maxDelayMs: config.stream.backoffMaxMs,
        }),
        logger,
        metricsCollector,
      })
  );

  const engine = new MarketEngine(snapshotProvider, rules, streams, {
    intervals: config.candles.intervals,
    maxSnapshotAttempts: config.snapshot.maxAttempts,
    snapshotRetryDelayMs: config.snapshot.retryDelayMs,
    maxBufferedUpdates: config.snapshot.maxBufferedUpdates,
    dedupWindowSize: config.candles.dedupWindowSize,
    candleRetention: config.candles.retention,
    closeGraceMs: config.candles.closeGraceMs,
    signalRetention: config.signals.retention,
    logger,
    metricsCollector,
  });

  engine.addSink(new LoggerSignalSink(logger.child({ component: 'LoggerSignalSink' })));
  const redisSink = config.redis ? new RedisSignalSink(config.redis.url, { stream: config.redis.stream }) : null;
  if (redisSink) {
    engine.addSink(redisSink);
  }

  const metricsServer =
    config.metricsPort === null
      ? null
      : new MetricsServer(metricsCollector, config.metricsPort, logger, () => {
          const status = engine.queries.status();
          return {
            healthy: status.streams.every((stream) => stream.state === 'connected'),
            ...status,
          };
        });
  metricsServer?.start();

  await engine.start();
  const ticker = setInterval(() => engine.tick(), TICK_INTERVAL_MS);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down market engine...', { signal });
    // SIGINT/SIGTERM で全ストリームを切断し、配信待ちのシグナルを流してから外部接続を閉じる。
    clearInterval(ticker);
    await engine.stop();
    await redisSink?.close();
    await metricsServer?.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Failed to shut down cleanly', { err: error });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to bootstrap market engine', { err: error });
  process.exit(1);
});
