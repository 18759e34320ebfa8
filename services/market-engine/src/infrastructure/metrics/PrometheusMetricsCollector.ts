import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { AnomalyKind } from '@/domain/errors';
import type { BookState, Severity } from '@/domain/types';

const BOOK_STATES: readonly BookState[] = ['syncing', 'live', 'desynced'];

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter;
  private readonly malformedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly bookStateGauge: Gauge;
  private readonly resyncCounter: Counter;
  private readonly anomalyCounter: Counter;
  private readonly candleCounter: Counter;
  private readonly signalCounter: Counter;
  private readonly ruleFailureCounter: Counter;
  private readonly deliveryFailureCounter: Counter;

  constructor() {
    this.register = new Registry();

    // 受信イベント数
    this.receivedCounter = new Counter({
      name: 'engine_events_received_total',
      help: 'Total number of normalized market events received',
      labelNames: ['type', 'instrument'],
      registers: [this.register],
    });

    this.malformedCounter = new Counter({
      name: 'engine_malformed_frames_total',
      help: 'Total number of frames dropped because they could not be decoded',
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'engine_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'engine_reconnects_total',
      help: 'Total number of reconnection attempts',
      registers: [this.register],
    });

    // 銘柄ごとの板状態（現在の状態のみ 1）
    this.bookStateGauge = new Gauge({
      name: 'engine_book_state',
      help: 'Order book state per instrument (1 for the current state)',
      labelNames: ['instrument', 'state'],
      registers: [this.register],
    });

    this.resyncCounter = new Counter({
      name: 'engine_book_resyncs_total',
      help: 'Total number of snapshot fetches for order book synchronization',
      labelNames: ['instrument'],
      registers: [this.register],
    });

    this.anomalyCounter = new Counter({
      name: 'engine_trade_anomalies_total',
      help: 'Total number of trades dropped as late or duplicate',
      labelNames: ['instrument', 'kind'],
      registers: [this.register],
    });

    this.candleCounter = new Counter({
      name: 'engine_candles_closed_total',
      help: 'Total number of closed candles',
      labelNames: ['instrument', 'interval', 'synthetic'],
      registers: [this.register],
    });

    this.signalCounter = new Counter({
      name: 'engine_signals_total',
      help: 'Total number of emitted signals',
      labelNames: ['rule_id', 'severity'],
      registers: [this.register],
    });

    this.ruleFailureCounter = new Counter({
      name: 'engine_rule_failures_total',
      help: 'Total number of rule evaluations that threw',
      labelNames: ['rule_id'],
      registers: [this.register],
    });

    this.deliveryFailureCounter = new Counter({
      name: 'engine_delivery_failures_total',
      help: 'Total number of failed signal deliveries',
      labelNames: ['sink'],
      registers: [this.register],
    });
  }

  incrementReceived(type: string, instrument: string): void {
    this.receivedCounter.inc({ type, instrument });
  }

  incrementMalformed(): void {
    this.malformedCounter.inc();
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(): void {
    this.reconnectCounter.inc();
  }

  recordBookState(instrument: string, state: BookState): void {
    for (const candidate of BOOK_STATES) {
      this.bookStateGauge.set({ instrument, state: candidate }, candidate === state ? 1 : 0);
    }
  }

  incrementResync(instrument: string): void {
    this.resyncCounter.inc({ instrument });
  }

  incrementAnomaly(instrument: string, kind: AnomalyKind): void {
    this.anomalyCounter.inc({ instrument, kind });
  }

  incrementCandleClosed(instrument: string, interval: string, synthetic: boolean): void {
    this.candleCounter.inc({ instrument, interval, synthetic: String(synthetic) });
  }

  incrementSignal(ruleId: string, severity: Severity): void {
    this.signalCounter.inc({ rule_id: ruleId, severity });
  }

  incrementRuleFailure(ruleId: string): void {
    this.ruleFailureCounter.inc({ rule_id: ruleId });
  }

  incrementDeliveryFailure(sink: string): void {
    this.deliveryFailureCounter.inc({ sink });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    return this.register;
  }
}
