import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { BoundedHistory } from '@/domain/BoundedHistory';
import { RuleEvaluationFault } from '@/domain/errors';
import type { Candle, Instrument, Ladder, Severity, SignalEvent, SignalPayloadValue } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';
import { evaluateRule, requiredBookDepth, requiredLookback } from './evaluateRule';
import type { SignalContext, SignalDraft, SignalRule } from './SignalRule';

/**
 * 板の読み取り。コピーを返すこと。
 */
export type BookReader = (instrument: Instrument, depth: number) => Ladder | null;

export type SignalListener = (event: SignalEvent) => void;

export interface SignalEngineOptions {
  bookReader?: BookReader;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  now?: () => number;
  idGenerator?: () => string;
}

/**
 * アプリケーション層: シグナルルールの評価
 *
 * 責務: 確定足ごとに、その足の長さに対応するルールを設定順に 1 回ずつ評価し、発火したものを SignalEvent として流す。
 * ルールは純粋関数で、例外を投げたルールはログに残してスキップする（他のルールの評価は続ける）。
 */
export class SignalEngine {
  private readonly rules: readonly SignalRule[];
  /** 足の長さごとの必要本数（ルールの最大値） */
  private readonly lookbackByInterval = new Map<number, number>();
  private readonly histories = new Map<Instrument, Map<number, BoundedHistory<Candle>>>();
  private readonly listeners: SignalListener[] = [];
  private readonly bookReader?: BookReader;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly now: () => number;
  private readonly idGenerator: () => string;

  constructor(rules: readonly SignalRule[], options: SignalEngineOptions = {}) {
    const ids = new Set<string>();
    for (const rule of rules) {
      if (ids.has(rule.id)) {
        throw new RangeError(`duplicate rule id: ${rule.id}`);
      }
      ids.add(rule.id);
      const lookback = requiredLookback(rule);
      this.lookbackByInterval.set(rule.interval, Math.max(this.lookbackByInterval.get(rule.interval) ?? 1, lookback));
    }
    this.rules = [...rules];
    this.bookReader = options.bookReader;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'SignalEngine' });
    this.metricsCollector = options.metricsCollector;
    this.now = options.now ?? Date.now;
    this.idGenerator = options.idGenerator ?? uuidv4;
  }

  onSignal(listener: SignalListener): void {
    this.listeners.push(listener);
  }

  subscribe(instrument: Instrument): void {
    if (this.histories.has(instrument)) {
      return;
    }
    const byInterval = new Map<number, BoundedHistory<Candle>>();
    for (const [interval, lookback] of this.lookbackByInterval) {
      byInterval.set(interval, new BoundedHistory<Candle>(lookback));
    }
    this.histories.set(instrument, byInterval);
  }

  unsubscribe(instrument: Instrument): void {
    this.histories.delete(instrument);
  }

  /**
   * 確定足を受け取り、対応するルールを評価する。
   * @returns 発行した SignalEvent（ルールの設定順）
   */
  onCandleClosed(candle: Candle): SignalEvent[] {
    const history = this.histories.get(candle.instrument)?.get(candle.interval);
    if (!history) {
      return [];
    }
    history.push(candle);

    const emitted: SignalEvent[] = [];
    for (const rule of this.rules) {
      if (rule.interval !== candle.interval) {
        continue;
      }
      const draft = this.evaluate(rule, candle, history);
      if (draft) {
        emitted.push(this.emit(candle.instrument, rule.id, rule.kind, candle.bucketStart + candle.interval, draft));
      }
    }
    return emitted;
  }

  /**
   * 内部起因（板同期の断念など）のシグナルを発行する。
   */
  raiseSystemSignal(
    instrument: Instrument,
    ruleId: string,
    severity: Severity,
    payload: Record<string, SignalPayloadValue>
  ): SignalEvent {
    return this.emit(instrument, ruleId, 'system', this.now(), { severity, payload });
  }

  ruleIds(): string[] {
    return this.rules.map((rule) => rule.id);
  }

  /**
   * 板の読み取りも含めて評価する。失敗したルールは発火なしとして扱う。
   */
  private evaluate(rule: SignalRule, candle: Candle, history: BoundedHistory<Candle>): SignalDraft | null {
    try {
      const context: SignalContext = {
        instrument: candle.instrument,
        interval: candle.interval,
        candles: history.last(requiredLookback(rule)),
        book: this.readBook(rule, candle.instrument),
        now: this.now(),
      };
      return evaluateRule(rule, context);
    } catch (error) {
      const fault = new RuleEvaluationFault(rule.id, { cause: error });
      this.metricsCollector?.incrementRuleFailure(rule.id);
      this.logger.error('rule evaluation failed', { ruleId: rule.id, instrument: candle.instrument, err: fault });
      return null;
    }
  }

  private readBook(rule: SignalRule, instrument: Instrument): Ladder | null {
    const depth = requiredBookDepth(rule);
    if (depth === null || !this.bookReader) {
      return null;
    }
    return this.bookReader(instrument, depth);
  }

  private emit(
    instrument: Instrument,
    ruleId: string,
    kind: string,
    timestamp: number,
    draft: SignalDraft
  ): SignalEvent {
    const event: SignalEvent = Object.freeze({
      id: this.idGenerator(),
      instrument,
      ruleId,
      kind,
      timestamp,
      severity: draft.severity,
      payload: Object.freeze({ ...draft.payload }),
    });
    this.metricsCollector?.incrementSignal(ruleId, draft.severity);
    this.logger.info('signal emitted', { instrument, ruleId, kind, severity: draft.severity });
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.metricsCollector?.incrementError('signal_listener_error');
        this.logger.error('signal listener failed', { signalId: event.id, ruleId, instrument, err: error });
      }
    }
    return event;
  }
}
