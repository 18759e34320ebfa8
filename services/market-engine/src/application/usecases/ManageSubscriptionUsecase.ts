import type { Logger } from '@/application/interfaces/Logger';
import type { InstrumentSubscriber, StreamSource } from '@/application/interfaces/StreamSource';
import type { Instrument } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';

export interface ManageSubscriptionDeps {
  streams: readonly StreamSource[];
  /** 板・足・シグナルなど、銘柄ごとの状態を持つコンポーネント（購読順に並べる） */
  engines: readonly InstrumentSubscriber[];
  /** 購読解除時に銘柄の履歴を破棄する */
  forget: (instrument: Instrument) => void;
  logger?: Logger;
}

/**
 * アプリケーション層: 銘柄の購読・購読解除ユースケース
 *
 * 購読: 先に下流の状態を作ってからストリームに購読させる（最初の差分から取りこぼさないため）。
 * 購読解除: 先にストリームで止め、その後で下流の状態と履歴を破棄する。
 */
export class ManageSubscriptionUsecase {
  private readonly logger: Logger;

  constructor(private readonly deps: ManageSubscriptionDeps) {
    if (deps.streams.length === 0) {
      throw new RangeError('at least one stream is required');
    }
    this.logger = (deps.logger ?? LoggerFactory.create()).child({ component: 'ManageSubscriptionUsecase' });
  }

  subscribe(instrument: Instrument): void {
    const normalized = instrument.toUpperCase();
    for (const engine of this.deps.engines) {
      engine.subscribe(normalized);
    }
    const stream = this.streamFor(normalized);
    stream.subscribe(normalized);
    this.logger.info('instrument subscribed', { instrument: normalized, stream: stream.name });
  }

  unsubscribe(instrument: Instrument): void {
    const normalized = instrument.toUpperCase();
    for (const stream of this.deps.streams) {
      stream.unsubscribe(normalized);
    }
    for (const engine of this.deps.engines) {
      engine.unsubscribe(normalized);
    }
    this.deps.forget(normalized);
    this.logger.info('instrument unsubscribed', { instrument: normalized });
  }

  /**
   * 既に担当しているストリーム、なければ担当銘柄が最も少ないストリームを返す。
   */
  private streamFor(instrument: Instrument): StreamSource {
    const owner = this.deps.streams.find((stream) => stream.instruments().includes(instrument));
    if (owner) {
      return owner;
    }
    return this.deps.streams.reduce((least, stream) =>
      stream.instruments().length < least.instruments().length ? stream : least
    );
  }
}
