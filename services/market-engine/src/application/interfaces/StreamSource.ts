import type { ConnectionState, Instrument } from '@/domain/types';
import type { MarketEventConsumer } from './MarketEventConsumer';

/**
 * 銘柄単位で購読を持つコンポーネント（ストリーム、板、足、シグナル）。
 */
export interface InstrumentSubscriber {
  subscribe(instrument: Instrument): void;
  unsubscribe(instrument: Instrument): void;
}

/**
 * 市場イベントの供給元（プレゼンテーション層の StreamClient が実装する）。
 */
export interface StreamSource extends InstrumentSubscriber {
  readonly name: string;
  readonly state: ConnectionState;
  readonly malformedCount: number;
  instruments(): Instrument[];
  addConsumer(consumer: MarketEventConsumer): void;
  start(): Promise<void>;
  stop(): void;
}
