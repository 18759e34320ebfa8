import type { SignalContext, SignalDraft, SpreadWideningRule } from '../SignalRule';

export function evaluateSpreadWidening(rule: SpreadWideningRule, context: SignalContext): SignalDraft | null {
  const { book } = context;
  if (!book || book.state !== 'live' || book.bids.length === 0 || book.asks.length === 0) {
    return null;
  }

  const bid = book.bids[0].price;
  const ask = book.asks[0].price;
  const mid = bid.plus(ask).div(2);
  if (mid.isZero()) {
    return null;
  }
  const spreadBps = ask.minus(bid).div(mid).mul(10_000);
  if (spreadBps.lessThan(rule.maxSpreadBps)) {
    return null;
  }

  return {
    severity: rule.severity,
    payload: {
      bid: bid.toString(),
      ask: ask.toString(),
      spreadBps: spreadBps.toDecimalPlaces(2).toNumber(),
      lastUpdateId: book.lastUpdateId,
    },
  };
}
