import { describe, expect, it } from 'vitest';
import { evaluateBookImbalance } from '@/application/signal/rules/bookImbalance';
import type { BookImbalanceRule, SignalContext } from '@/application/signal/SignalRule';
import type { Ladder } from '@/domain/types';
import { ladder } from '../../../helpers/ladder';

const rule: BookImbalanceRule = {
  id: 'book-imbalance-1m',
  kind: 'book_imbalance',
  interval: 60_000,
  severity: 'info',
  depth: 2,
  ratio: 0.7,
};

function context(book: Ladder | null): SignalContext {
  return { instrument: 'BTCUSDT', interval: 60_000, candles: [], book, now: 0 };
}

describe('evaluateBookImbalance', () => {
  it('上位 depth レベルの買い比率が ratio 以上なら bid_heavy', () => {
    const book = ladder(
      [
        [100, 3],
        [99, 4],
        [98, 100],
      ],
      [
        [101, 1],
        [102, 2],
      ]
    );

    expect(evaluateBookImbalance(rule, context(book))).toEqual({
      severity: 'info',
      payload: { side: 'bid_heavy', bidShare: 0.7, bidQuantity: '7', askQuantity: '3', depth: 2 },
    });
  });

  it('買い比率が 1 - ratio 以下なら ask_heavy', () => {
    const book = ladder(
      [
        [100, 1],
        [99, 1],
      ],
      [
        [101, 4],
        [102, 4],
      ]
    );

    const draft = evaluateBookImbalance(rule, context(book));
    expect(draft?.payload.side).toBe('ask_heavy');
    expect(draft?.payload.bidShare).toBe(0.2);
  });

  it('偏りがなければ発火しない', () => {
    expect(evaluateBookImbalance(rule, context(ladder([[100, 5]], [[101, 5]])))).toBeNull();
  });

  it('板が空、live でない、または存在しなければ判定しない', () => {
    expect(evaluateBookImbalance(rule, context(ladder([], [])))).toBeNull();
    expect(evaluateBookImbalance(rule, context(ladder([[100, 9]], [[101, 1]], { state: 'desynced' })))).toBeNull();
    expect(evaluateBookImbalance(rule, context(null))).toBeNull();
  });
});
