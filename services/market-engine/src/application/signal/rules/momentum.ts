import type { MomentumRule, SignalContext, SignalDraft } from '../SignalRule';

/**
 * 直近 window 本の足の先頭の終値から末尾の終値までの変化率で判定する。
 */
export function evaluateMomentum(rule: MomentumRule, context: SignalContext): SignalDraft | null {
  const { candles } = context;
  if (rule.window < 2 || candles.length < rule.window) {
    return null;
  }

  const first = candles[candles.length - rule.window];
  const last = candles[candles.length - 1];
  if (first.close.isZero()) {
    return null;
  }

  const changePct = last.close.minus(first.close).div(first.close).mul(100);
  const magnitude = changePct.abs();
  if (magnitude.lessThan(rule.thresholdPct)) {
    return null;
  }

  return {
    severity: magnitude.greaterThanOrEqualTo(rule.thresholdPct * 2) ? 'critical' : rule.severity,
    payload: {
      direction: changePct.isPositive() ? 'up' : 'down',
      changePct: changePct.toDecimalPlaces(4).toNumber(),
      fromClose: first.close.toString(),
      toClose: last.close.toString(),
      bucketStart: last.bucketStart,
    },
  };
}
