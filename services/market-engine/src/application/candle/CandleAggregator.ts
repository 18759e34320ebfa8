import Decimal from 'decimal.js';
import type { Logger } from '@/application/interfaces/Logger';
import type { MarketEventConsumer } from '@/application/interfaces/MarketEventConsumer';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { BoundedHistory } from '@/domain/BoundedHistory';
import { type AnomalyKind, AnomalyFault } from '@/domain/errors';
import { bucketStartOf, formatInterval } from '@/domain/interval';
import type { Candle, Instrument, MarketEvent, Trade } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';
import { RecentIdWindow } from './RecentIdWindow';

export interface CandleAggregatorOptions {
  /** 集計する足の長さ（ミリ秒） */
  intervals: number[];
  /** 重複検知に使う直近の約定 ID 数 */
  dedupWindowSize?: number;
  /** (銘柄, 足) ごとに保持する確定足の数 */
  retention?: number;
  /** バケット終了からこの時間が経過したら advanceTo() で確定させる */
  closeGraceMs?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

export type CandleListener = (candle: Candle) => void;
export type AnomalyListener = (fault: AnomalyFault) => void;

interface CandleSeries {
  interval: number;
  open: Candle | null;
  lastClosed: Candle | null;
  history: BoundedHistory<Candle>;
}

interface InstrumentCandles {
  seenTradeIds: RecentIdWindow;
  series: Map<number, CandleSeries>;
  anomalies: Record<AnomalyKind, number>;
}

/**
 * アプリケーション層: 約定を OHLCV 足に集計する
 *
 * 責務: 銘柄 × 足の長さごとに未確定の足を 1 本持ち、バケットが進んだら確定して下流へ渡す。
 * 約定のなかったバケットは直前の終値で埋めた出来高 0 の足を出すため、確定足の列に抜けはない。
 * 確定済みの足は凍結され、以後変更されない。
 */
export class CandleAggregator implements MarketEventConsumer {
  private readonly instruments = new Map<Instrument, InstrumentCandles>();
  private readonly candleListeners: CandleListener[] = [];
  private readonly anomalyListeners: AnomalyListener[] = [];
  private readonly intervals: number[];
  private readonly dedupWindowSize: number;
  private readonly retention: number;
  private readonly closeGraceMs: number;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  constructor(options: CandleAggregatorOptions) {
    if (options.intervals.length === 0) {
      throw new RangeError('at least one interval is required');
    }
    this.intervals = [...new Set(options.intervals)].sort((a, b) => a - b);
    this.dedupWindowSize = options.dedupWindowSize ?? 1000;
    this.retention = options.retention ?? 500;
    this.closeGraceMs = options.closeGraceMs ?? 2000;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'CandleAggregator' });
    this.metricsCollector = options.metricsCollector;
  }

  onCandleClosed(listener: CandleListener): void {
    this.candleListeners.push(listener);
  }

  onAnomaly(listener: AnomalyListener): void {
    this.anomalyListeners.push(listener);
  }

  subscribe(instrument: Instrument): void {
    if (this.instruments.has(instrument)) {
      return;
    }
    const series = new Map<number, CandleSeries>();
    for (const interval of this.intervals) {
      series.set(interval, {
        interval,
        open: null,
        lastClosed: null,
        history: new BoundedHistory<Candle>(this.retention),
      });
    }
    this.instruments.set(instrument, {
      seenTradeIds: new RecentIdWindow(this.dedupWindowSize),
      series,
      anomalies: { late_trade: 0, duplicate_trade: 0 },
    });
  }

  /**
   * 銘柄の足をすべて破棄する。未確定の足は確定させずに捨てる。
   */
  unsubscribe(instrument: Instrument): void {
    this.instruments.delete(instrument);
  }

  onEvent(event: MarketEvent): void {
    if (event.type === 'trade') {
      this.handleTrade(event);
    }
  }

  /**
   * 約定を集計する。
   * 重複した約定 ID、または確定済みバケットに属する約定は破棄してカウントする。
   */
  handleTrade(trade: Trade): void {
    const state = this.instruments.get(trade.instrument);
    if (!state) {
      return;
    }

    if (state.seenTradeIds.has(trade.tradeId)) {
      this.reportAnomaly(state, trade, 'duplicate_trade', `duplicate trade ${trade.tradeId}`);
      return;
    }

    // どれか 1 本でも遅延扱いになる約定は全足で捨てる（足の長さ間で出来高を揃えるため）
    for (const series of state.series.values()) {
      if (this.isLate(series, trade.timestamp)) {
        this.reportAnomaly(
          state,
          trade,
          'late_trade',
          `late trade ${trade.tradeId} at ${trade.timestamp} for ${formatInterval(series.interval)}`
        );
        return;
      }
    }

    state.seenTradeIds.add(trade.tradeId);
    for (const series of state.series.values()) {
      this.applyTrade(trade.instrument, series, trade);
    }
  }

  /**
   * 時刻を進め、終了済みのバケットを確定させる。
   * 約定がないまま経過したバケットについても出来高 0 の足を出す。
   */
  advanceTo(now: number): void {
    for (const [instrument, state] of this.instruments) {
      for (const series of state.series.values()) {
        const { interval } = series;
        if (series.open) {
          if (series.open.bucketStart + interval + this.closeGraceMs > now) {
            continue;
          }
          this.close(instrument, series, series.open);
          series.open = null;
        }
        let last = series.lastClosed;
        while (last && last.bucketStart + 2 * interval + this.closeGraceMs <= now) {
          this.close(instrument, series, this.synthetic(last, last.bucketStart + interval));
          last = series.lastClosed;
        }
      }
    }
  }

  /**
   * 確定足を古い順に最大 n 本返す。
   */
  recentCandles(instrument: Instrument, interval: number, n: number): Candle[] {
    return this.instruments.get(instrument)?.series.get(interval)?.history.last(n) ?? [];
  }

  /**
   * 未確定の足のコピーを返す。
   */
  openCandle(instrument: Instrument, interval: number): Candle | null {
    const open = this.instruments.get(instrument)?.series.get(interval)?.open;
    return open ? { ...open } : null;
  }

  anomalyCounts(instrument: Instrument): Record<AnomalyKind, number> | null {
    const state = this.instruments.get(instrument);
    return state ? { ...state.anomalies } : null;
  }

  configuredIntervals(): number[] {
    return [...this.intervals];
  }

  private isLate(series: CandleSeries, timestamp: number): boolean {
    const bucket = bucketStartOf(timestamp, series.interval);
    if (series.open) {
      return bucket < series.open.bucketStart;
    }
    return series.lastClosed !== null && bucket <= series.lastClosed.bucketStart;
  }

  private applyTrade(instrument: Instrument, series: CandleSeries, trade: Trade): void {
    const bucket = bucketStartOf(trade.timestamp, series.interval);
    const open = series.open;

    if (open && open.bucketStart === bucket) {
      if (trade.price.greaterThan(open.high)) {
        open.high = trade.price;
      }
      if (trade.price.lessThan(open.low)) {
        open.low = trade.price;
      }
      open.close = trade.price;
      open.volume = open.volume.plus(trade.quantity);
      open.tradeCount += 1;
      return;
    }

    if (open) {
      this.close(instrument, series, open);
      series.open = null;
    }

    // 間のバケットを直前の終値で埋める
    let last = series.lastClosed;
    while (last && last.bucketStart + series.interval < bucket) {
      this.close(instrument, series, this.synthetic(last, last.bucketStart + series.interval));
      last = series.lastClosed;
    }

    series.open = {
      instrument,
      interval: series.interval,
      bucketStart: bucket,
      open: trade.price,
      high: trade.price,
      low: trade.price,
      close: trade.price,
      volume: trade.quantity,
      tradeCount: 1,
      closed: false,
      synthetic: false,
    };
  }

  private synthetic(previous: Candle, bucketStart: number): Candle {
    return {
      instrument: previous.instrument,
      interval: previous.interval,
      bucketStart,
      open: previous.close,
      high: previous.close,
      low: previous.close,
      close: previous.close,
      volume: new Decimal(0),
      tradeCount: 0,
      closed: false,
      synthetic: true,
    };
  }

  private close(instrument: Instrument, series: CandleSeries, candle: Candle): void {
    const closed: Candle = Object.freeze({ ...candle, closed: true });
    series.lastClosed = closed;
    series.history.push(closed);
    this.metricsCollector?.incrementCandleClosed(instrument, formatInterval(series.interval), closed.synthetic);
    for (const listener of this.candleListeners) {
      listener(closed);
    }
  }

  private reportAnomaly(state: InstrumentCandles, trade: Trade, kind: AnomalyKind, message: string): void {
    state.anomalies[kind] += 1;
    const fault = new AnomalyFault(trade.instrument, kind, message);
    this.metricsCollector?.incrementAnomaly(trade.instrument, kind);
    this.logger.debug('trade dropped', { instrument: trade.instrument, kind, tradeId: trade.tradeId });
    for (const listener of this.anomalyListeners) {
      listener(fault);
    }
  }
}
