import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { SignalSink } from '@/application/interfaces/SignalSink';
import { BoundedHistory } from '@/domain/BoundedHistory';
import type { Instrument, SignalEvent } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';

export interface SignalDispatcherOptions {
  /** 銘柄ごとに保持するシグナル数 */
  retention?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * アプリケーション層: シグナルの配信境界
 *
 * 責務: 発行された SignalEvent を履歴に残し、登録されたシンクへ配る。
 * シンクごとに配信を直列化して発行順を保ち、取り込み側は配信の完了を待たない。
 * 配信失敗はログとメトリクスに残すだけで、再送はしない。
 */
export class SignalDispatcher {
  private readonly sinks: SignalSink[] = [];
  /** シンクごとの配信チェーン（直前の配信が終わってから次を配る） */
  private readonly pending = new Map<SignalSink, Promise<void>>();
  private readonly history = new Map<Instrument, BoundedHistory<SignalEvent>>();
  private readonly retention: number;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  constructor(options: SignalDispatcherOptions = {}) {
    this.retention = options.retention ?? 200;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'SignalDispatcher' });
    this.metricsCollector = options.metricsCollector;
  }

  addSink(sink: SignalSink): void {
    this.sinks.push(sink);
    this.pending.set(sink, Promise.resolve());
  }

  /**
   * シグナルを受け付ける。配信は非同期に行われる。
   */
  dispatch(event: SignalEvent): void {
    let history = this.history.get(event.instrument);
    if (!history) {
      history = new BoundedHistory<SignalEvent>(this.retention);
      this.history.set(event.instrument, history);
    }
    history.push(event);

    for (const sink of this.sinks) {
      const previous = this.pending.get(sink) ?? Promise.resolve();
      this.pending.set(
        sink,
        previous.then(() => this.deliver(sink, event))
      );
    }
  }

  /**
   * 直近 n 件のシグナルを古い順に返す。
   */
  recentSignals(instrument: Instrument, n: number): SignalEvent[] {
    return this.history.get(instrument)?.last(n) ?? [];
  }

  /**
   * 銘柄のシグナル履歴を破棄する。
   */
  forget(instrument: Instrument): void {
    this.history.delete(instrument);
  }

  /**
   * 受付済みの配信がすべて終わるまで待つ。
   */
  async flush(): Promise<void> {
    await Promise.all(this.pending.values());
  }

  private async deliver(sink: SignalSink, event: SignalEvent): Promise<void> {
    try {
      await sink.deliver(event);
    } catch (error) {
      this.metricsCollector?.incrementDeliveryFailure(sink.name);
      this.logger.error('signal delivery failed', {
        sink: sink.name,
        signalId: event.id,
        ruleId: event.ruleId,
        instrument: event.instrument,
        err: error,
      });
    }
  }
}
