import Decimal from 'decimal.js';
import type { SignalContext, SignalDraft, VolumeSpikeRule } from '../SignalRule';

/**
 * 出来高急増の判定。ウィンドウが埋まっていない、または基準出来高が 0 の場合は判定しない。
 */
export function evaluateVolumeSpike(rule: VolumeSpikeRule, context: SignalContext): SignalDraft | null {
  const { candles } = context;
  if (rule.window < 2 || candles.length < rule.window) {
    return null;
  }

  const window = candles.slice(-rule.window);
  const current = window[window.length - 1];
  const baseline = window.slice(0, -1);
  const mean = baseline.reduce((sum, candle) => sum.plus(candle.volume), new Decimal(0)).div(baseline.length);
  if (mean.isZero()) {
    return null;
  }

  const ratio = current.volume.div(mean);
  if (ratio.lessThan(rule.multiplier)) {
    return null;
  }

  return {
    severity: ratio.greaterThanOrEqualTo(rule.multiplier * 2) ? 'critical' : rule.severity,
    payload: {
      bucketStart: current.bucketStart,
      volume: current.volume.toString(),
      baselineVolume: mean.toString(),
      ratio: ratio.toDecimalPlaces(4).toNumber(),
    },
  };
}
