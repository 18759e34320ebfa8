import type { Candle, Instrument, Ladder, Severity, SignalPayloadValue } from '@/domain/types';

/**
 * シグナルルールの定義（閉じたタグ付きユニオン）。
 * 評価関数は rules/ 以下の純粋関数で、evaluateRule() が kind で振り分ける。
 */
interface RuleBase {
  /** ルール ID。SignalEvent.ruleId になる */
  id: string;
  /** このルールを評価する足の長さ（ミリ秒） */
  interval: number;
  /** 閾値を満たしたときの基本の重要度 */
  severity: Severity;
}

/**
 * 直近の足の出来高が、それ以前 window - 1 本の平均の multiplier 倍以上
 */
export interface VolumeSpikeRule extends RuleBase {
  kind: 'volume_spike';
  window: number;
  multiplier: number;
}

/**
 * window 本の足で終値が thresholdPct % 以上動いた
 */
export interface MomentumRule extends RuleBase {
  kind: 'momentum';
  window: number;
  thresholdPct: number;
}

/**
 * 最良気配のスプレッドが仲値比 maxSpreadBps 以上
 */
export interface SpreadWideningRule extends RuleBase {
  kind: 'spread_widening';
  maxSpreadBps: number;
}

/**
 * 上位 depth レベルの買い数量の比率が ratio 以上、または 1 - ratio 以下
 */
export interface BookImbalanceRule extends RuleBase {
  kind: 'book_imbalance';
  depth: number;
  ratio: number;
}

export type SignalRule = VolumeSpikeRule | MomentumRule | SpreadWideningRule | BookImbalanceRule;

export type SignalRuleKind = SignalRule['kind'];

/**
 * ルールに渡す評価コンテキスト。すべてコピーなので、ルールが書き換えても元の状態には影響しない。
 */
export interface SignalContext {
  instrument: Instrument;
  interval: number;
  /** 直近の確定足（古い → 新しい）。末尾が今回確定した足 */
  candles: readonly Candle[];
  /** 板の読み取り結果。板を使わないルール、または未購読の場合は null */
  book: Ladder | null;
  now: number;
}

/**
 * ルールが返す発火内容。SignalEngine が ID・時刻などを付けて SignalEvent にする。
 */
export interface SignalDraft {
  severity: Severity;
  payload: Record<string, SignalPayloadValue>;
}
