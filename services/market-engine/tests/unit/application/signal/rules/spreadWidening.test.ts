import { describe, expect, it } from 'vitest';
import { evaluateSpreadWidening } from '@/application/signal/rules/spreadWidening';
import type { SignalContext, SpreadWideningRule } from '@/application/signal/SignalRule';
import type { Ladder } from '@/domain/types';
import { candle } from '../../../helpers/factories';
import { ladder } from '../../../helpers/ladder';

const rule: SpreadWideningRule = {
  id: 'spread-widening-1m',
  kind: 'spread_widening',
  interval: 60_000,
  severity: 'warning',
  maxSpreadBps: 10,
};

function context(book: Ladder | null): SignalContext {
  return { instrument: 'BTCUSDT', interval: 60_000, candles: [candle(0, { close: 100 })], book, now: 0 };
}

describe('evaluateSpreadWidening', () => {
  it('スプレッドが閾値以上なら発火する', () => {
    const book = ladder([['99.9', 1]], [['100.1', 1]], { lastUpdateId: 7 });

    expect(evaluateSpreadWidening(rule, context(book))).toEqual({
      severity: 'warning',
      payload: { bid: '99.9', ask: '100.1', spreadBps: 20, lastUpdateId: 7 },
    });
  });

  it('閾値ちょうどでも発火する', () => {
    const book = ladder([['99.95', 1]], [['100.05', 1]]);

    expect(evaluateSpreadWidening(rule, context(book))?.payload.spreadBps).toBe(10);
  });

  it('閾値未満なら発火しない', () => {
    expect(evaluateSpreadWidening(rule, context(ladder([['99.99', 1]], [['100.01', 1]])))).toBeNull();
  });

  it('板が live でなければ判定しない', () => {
    const book = ladder([['99', 1]], [['101', 1]], { state: 'syncing' });

    expect(evaluateSpreadWidening(rule, context(book))).toBeNull();
  });

  it('片側が空、または板がなければ判定しない', () => {
    expect(evaluateSpreadWidening(rule, context(ladder([['99', 1]], [])))).toBeNull();
    expect(evaluateSpreadWidening(rule, context(null))).toBeNull();
  });
});
