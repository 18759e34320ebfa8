import type { CandleAggregator } from '@/application/candle/CandleAggregator';
import type { SignalDispatcher } from '@/application/dispatch/SignalDispatcher';
import type { StreamSource } from '@/application/interfaces/StreamSource';
import type { OrderBookEngine } from '@/application/orderbook/OrderBookEngine';
import type { AnomalyKind } from '@/domain/errors';
import { formatInterval, parseInterval } from '@/domain/interval';
import type { BookState, Candle, ConnectionState, Instrument, Ladder, SignalEvent } from '@/domain/types';

export interface StreamStatus {
  name: string;
  state: ConnectionState;
  instruments: Instrument[];
  malformedFrames: number;
}

export interface EngineStatus {
  streams: StreamStatus[];
  books: Record<Instrument, BookState>;
  anomalies: Record<Instrument, Record<AnomalyKind, number>>;
  intervals: string[];
}

/**
 * アプリケーション層: 読み取り専用の問い合わせ窓口
 *
 * すべて同期的なスナップショット読み取りで、返す値はコピー。
 */
export class MarketQueryService {
  constructor(
    private readonly books: OrderBookEngine,
    private readonly candles: CandleAggregator,
    private readonly dispatcher: SignalDispatcher,
    private readonly streams: readonly StreamSource[]
  ) {}

  /**
   * @param depth 片側あたりのレベル数（省略時は全件）
   * @returns 未購読なら null
   */
  currentBook(instrument: Instrument, depth?: number): Ladder | null {
    return this.books.currentBook(instrument.toUpperCase(), depth);
  }

  /**
   * 確定足を古い順に最大 n 本返す。
   * @param interval ミリ秒、または '1m' のような表記
   * @throws {RangeError} 表記が解釈できない場合
   */
  recentCandles(instrument: Instrument, interval: number | string, n: number): Candle[] {
    const ms = typeof interval === 'number' ? interval : parseInterval(interval);
    if (ms === null) {
      throw new RangeError(`invalid interval: ${interval}`);
    }
    return this.candles.recentCandles(instrument.toUpperCase(), ms, n);
  }

  recentSignals(instrument: Instrument, n: number): SignalEvent[] {
    return this.dispatcher.recentSignals(instrument.toUpperCase(), n);
  }

  status(): EngineStatus {
    const books = this.books.states();
    const anomalies: Record<Instrument, Record<AnomalyKind, number>> = {};
    for (const instrument of Object.keys(books)) {
      const counts = this.candles.anomalyCounts(instrument);
      if (counts) {
        anomalies[instrument] = counts;
      }
    }
    return {
      streams: this.streams.map((stream) => ({
        name: stream.name,
        state: stream.state,
        instruments: stream.instruments(),
        malformedFrames: stream.malformedCount,
      })),
      books,
      anomalies,
      intervals: this.candles.configuredIntervals().map(formatInterval),
    };
  }
}
