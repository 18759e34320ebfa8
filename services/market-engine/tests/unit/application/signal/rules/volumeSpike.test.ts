import { describe, expect, it } from 'vitest';
import { evaluateVolumeSpike } from '@/application/signal/rules/volumeSpike';
import type { SignalContext, VolumeSpikeRule } from '@/application/signal/SignalRule';
import { candle } from '../../../helpers/factories';

const rule: VolumeSpikeRule = {
  id: 'volume-spike-1m',
  kind: 'volume_spike',
  interval: 60_000,
  severity: 'warning',
  window: 5,
  multiplier: 3,
};

function context(volumes: number[]): SignalContext {
  return {
    instrument: 'BTCUSDT',
    interval: 60_000,
    candles: volumes.map((volume, i) => candle(i * 60_000, { close: 100, volume })),
    book: null,
    now: 0,
  };
}

describe('evaluateVolumeSpike', () => {
  it('直近の出来高が基準の 2 倍の倍率以上なら critical', () => {
    expect(evaluateVolumeSpike(rule, context([1, 1, 1, 1, 50]))).toEqual({
      severity: 'critical',
      payload: {
        bucketStart: 240_000,
        volume: '50',
        baselineVolume: '1',
        ratio: 50,
      },
    });
  });

  it('倍率ちょうどならルールの重要度で発火する', () => {
    expect(evaluateVolumeSpike(rule, context([2, 2, 2, 2, 6]))?.severity).toBe('warning');
  });

  it('倍率未満なら発火しない', () => {
    expect(evaluateVolumeSpike(rule, context([2, 2, 2, 2, 5]))).toBeNull();
  });

  it('足が window 本に満たなければ判定しない', () => {
    expect(evaluateVolumeSpike(rule, context([1, 1, 1, 50]))).toBeNull();
  });

  it('基準出来高が 0 なら判定しない', () => {
    expect(evaluateVolumeSpike(rule, context([0, 0, 0, 0, 5]))).toBeNull();
  });

  it('window より古い足は基準に含めない', () => {
    expect(evaluateVolumeSpike(rule, context([100, 1, 1, 1, 1, 4]))?.payload.ratio).toBe(4);
  });
});
