import { CandleAggregator } from '@/application/candle/CandleAggregator';
import { SignalDispatcher } from '@/application/dispatch/SignalDispatcher';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { SignalSink } from '@/application/interfaces/SignalSink';
import type { SnapshotProvider } from '@/application/interfaces/SnapshotProvider';
import type { StreamSource } from '@/application/interfaces/StreamSource';
import { OrderBookEngine } from '@/application/orderbook/OrderBookEngine';
import { MarketQueryService } from '@/application/queries/MarketQueryService';
import { SignalEngine } from '@/application/signal/SignalEngine';
import type { SignalRule } from '@/application/signal/SignalRule';
import { ManageSubscriptionUsecase } from '@/application/usecases/ManageSubscriptionUsecase';
import { ProcessMarketEventUsecase } from '@/application/usecases/ProcessMarketEventUsecase';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';

export interface MarketEngineOptions {
  /** 集計する足の長さ（ミリ秒） */
  intervals: number[];
  maxSnapshotAttempts?: number;
  snapshotRetryDelayMs?: number;
  maxBufferedUpdates?: number;
  dedupWindowSize?: number;
  candleRetention?: number;
  closeGraceMs?: number;
  signalRetention?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  now?: () => number;
  idGenerator?: () => string;
}

/** 板同期を諦めたときに発行する system シグナルのルール ID */
export const ORDERBOOK_SYNC_RULE_ID = 'orderbook_sync';

/**
 * アプリケーション層: エンジン全体の組み立て
 *
 * Stream → {OrderBookEngine, CandleAggregator} → SignalEngine → SignalDispatcher の流れを配線する。
 * どのコンポーネントもイベントを同期的に処理し、シンクへの配信だけが非同期に流れる。
 */
export class MarketEngine {
  readonly books: OrderBookEngine;
  readonly candles: CandleAggregator;
  readonly signals: SignalEngine;
  readonly dispatcher: SignalDispatcher;
  readonly queries: MarketQueryService;
  readonly subscriptions: ManageSubscriptionUsecase;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    snapshotProvider: SnapshotProvider,
    rules: readonly SignalRule[],
    private readonly streams: readonly StreamSource[],
    options: MarketEngineOptions
  ) {
    const logger = options.logger ?? LoggerFactory.create();
    const { metricsCollector } = options;
    this.logger = logger.child({ component: 'MarketEngine' });
    this.now = options.now ?? Date.now;

    this.books = new OrderBookEngine(snapshotProvider, {
      maxSnapshotAttempts: options.maxSnapshotAttempts,
      snapshotRetryDelayMs: options.snapshotRetryDelayMs,
      maxBufferedUpdates: options.maxBufferedUpdates,
      logger,
      metricsCollector,
      now: this.now,
    });
    this.candles = new CandleAggregator({
      intervals: options.intervals,
      dedupWindowSize: options.dedupWindowSize,
      retention: options.candleRetention,
      closeGraceMs: options.closeGraceMs,
      logger,
      metricsCollector,
    });
    this.signals = new SignalEngine(rules, {
      bookReader: (instrument, depth) => this.books.currentBook(instrument, depth),
      logger,
      metricsCollector,
      now: this.now,
      idGenerator: options.idGenerator,
    });
    this.dispatcher = new SignalDispatcher({ retention: options.signalRetention, logger, metricsCollector });

    this.candles.onCandleClosed((candle) => {
      this.signals.onCandleClosed(candle);
    });
    this.signals.onSignal((event) => {
      this.dispatcher.dispatch(event);
    });
    this.books.onSyncAlert((alert) => {
      this.signals.raiseSystemSignal(alert.instrument, ORDERBOOK_SYNC_RULE_ID, 'critical', {
        reason: alert.reason,
        attempts: alert.attempts,
      });
    });

    const ingest = new ProcessMarketEventUsecase([this.books, this.candles], { logger, metricsCollector });
    for (const stream of streams) {
      stream.addConsumer(ingest);
    }

    this.subscriptions = new ManageSubscriptionUsecase({
      streams,
      engines: [this.signals, this.candles, this.books],
      forget: (instrument) => this.dispatcher.forget(instrument),
      logger,
    });
    this.queries = new MarketQueryService(this.books, this.candles, this.dispatcher, streams);
  }

  addSink(sink: SignalSink): void {
    this.dispatcher.addSink(sink);
  }

  /**
   * 各ストリームの初期銘柄を購読してから接続を開始する。
   */
  async start(): Promise<void> {
    for (const stream of this.streams) {
      for (const instrument of stream.instruments()) {
        this.subscriptions.subscribe(instrument);
      }
    }
    await Promise.all(this.streams.map((stream) => stream.start()));
    this.logger.info('market engine started', {
      streams: this.streams.map((stream) => stream.name),
      rules: this.signals.ruleIds(),
    });
  }

  /**
   * 時刻を進め、約定のないまま終わったバケットの足を確定させる。
   */
  tick(now: number = this.now()): void {
    this.candles.advanceTo(now);
  }

  /**
   * 接続を止め、受付済みのシグナル配信が終わるまで待つ。
   */
  async stop(): Promise<void> {
    for (const stream of this.streams) {
      stream.stop();
    }
    this.books.close();
    await this.dispatcher.flush();
    this.logger.info('market engine stopped');
  }
}
