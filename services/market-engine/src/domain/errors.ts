/**
 * ドメイン層: エラー分類
 *
 * どのエラーもプロセスを落とさない。回復はそれぞれの発生箇所で行い、
 * 外から見えるのは状態フィールド（接続イベント、板の desynced など）のみ。
 */

export type MarketEngineErrorCode =
  | 'TRANSPORT_FAULT'
  | 'SEQUENCE_GAP'
  | 'SNAPSHOT_FETCH_FAULT'
  | 'ANOMALY'
  | 'RULE_EVALUATION_FAULT'
  | 'DELIVERY_ERROR'
  | 'CONFIGURATION_ERROR';

export class MarketEngineError extends Error {
  readonly code: MarketEngineErrorCode;

  constructor(message: string, code: MarketEngineErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'MarketEngineError';
  }
}

/**
 * 接続断・不正フレーム。Stream Client 内で再接続により回復する。
 */
export class TransportFault extends MarketEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_FAULT', options);
    this.name = 'TransportFault';
  }
}

/**
 * 差分板更新の ID 不連続。
 */
export class SequenceGapFault extends MarketEngineError {
  constructor(
    readonly instrument: string,
    readonly expectedFirstUpdateId: number,
    readonly actualFirstUpdateId: number
  ) {
    super(
      `update id gap for ${instrument}: expected ${expectedFirstUpdateId}, got ${actualFirstUpdateId}`,
      'SEQUENCE_GAP'
    );
    this.name = 'SequenceGapFault';
  }
}

export class SnapshotFetchFault extends MarketEngineError {
  constructor(
    readonly instrument: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'SNAPSHOT_FETCH_FAULT', options);
    this.name = 'SnapshotFetchFault';
  }
}

export type AnomalyKind = 'late_trade' | 'duplicate_trade';

/**
 * 遅延・重複した約定。カウントして破棄する。
 */
export class AnomalyFault extends MarketEngineError {
  constructor(
    readonly instrument: string,
    readonly kind: AnomalyKind,
    message: string
  ) {
    super(message, 'ANOMALY');
    this.name = 'AnomalyFault';
  }
}

export class RuleEvaluationFault extends MarketEngineError {
  constructor(
    readonly ruleId: string,
    options?: { cause?: unknown }
  ) {
    super(`rule ${ruleId} failed to evaluate`, 'RULE_EVALUATION_FAULT', options);
    this.name = 'RuleEvaluationFault';
  }
}

/**
 * シンクへの配信失敗。再送はシンク側の責務。
 */
export class DeliveryError extends MarketEngineError {
  constructor(
    readonly sink: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'DELIVERY_ERROR', options);
    this.name = 'DeliveryError';
  }
}

export class ConfigurationError extends MarketEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.name = 'ConfigurationError';
  }
}
