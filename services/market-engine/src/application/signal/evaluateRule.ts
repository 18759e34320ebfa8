import { evaluateBookImbalance } from './rules/bookImbalance';
import { evaluateMomentum } from './rules/momentum';
import { evaluateSpreadWidening } from './rules/spreadWidening';
import { evaluateVolumeSpike } from './rules/volumeSpike';
import type { SignalContext, SignalDraft, SignalRule } from './SignalRule';

/**
 * ルール種別ごとの評価関数への振り分け。
 */
export function evaluateRule(rule: SignalRule, context: SignalContext): SignalDraft | null {
  switch (rule.kind) {
    case 'volume_spike':
      return evaluateVolumeSpike(rule, context);
    case 'momentum':
      return evaluateMomentum(rule, context);
    case 'spread_widening':
      return evaluateSpreadWidening(rule, context);
    case 'book_imbalance':
      return evaluateBookImbalance(rule, context);
  }
}

/**
 * ルールの評価に必要な確定足の本数。
 */
export function requiredLookback(rule: SignalRule): number {
  switch (rule.kind) {
    case 'volume_spike':
    case 'momentum':
      return rule.window;
    case 'spread_widening':
    case 'book_imbalance':
      return 1;
  }
}

/**
 * ルールが板の読み取りを必要とする場合、その深さ。不要なら null。
 */
export function requiredBookDepth(rule: SignalRule): number | null {
  switch (rule.kind) {
    case 'spread_widening':
      return 1;
    case 'book_imbalance':
      return rule.depth;
    case 'volume_spike':
    case 'momentum':
      return null;
  }
}
