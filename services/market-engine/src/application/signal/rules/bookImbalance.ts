import Decimal from 'decimal.js';
import type { PriceLevel } from '@/domain/types';
import type { BookImbalanceRule, SignalContext, SignalDraft } from '../SignalRule';

function totalQuantity(levels: readonly PriceLevel[], depth: number): Decimal {
  return levels.slice(0, depth).reduce((sum, level) => sum.plus(level.quantity), new Decimal(0));
}

/**
 * 上位 depth レベルの買い/売り数量の偏りで判定する。
 */
export function evaluateBookImbalance(rule: BookImbalanceRule, context: SignalContext): SignalDraft | null {
  const { book } = context;
  if (!book || book.state !== 'live') {
    return null;
  }

  const bidQuantity = totalQuantity(book.bids, rule.depth);
  const askQuantity = totalQuantity(book.asks, rule.depth);
  const total = bidQuantity.plus(askQuantity);
  if (total.isZero()) {
    return null;
  }

  const bidShare = bidQuantity.div(total);
  let side: 'bid_heavy' | 'ask_heavy';
  if (bidShare.greaterThanOrEqualTo(rule.ratio)) {
    side = 'bid_heavy';
  } else if (bidShare.lessThanOrEqualTo(1 - rule.ratio)) {
    side = 'ask_heavy';
  } else {
    return null;
  }

  return {
    severity: rule.severity,
    payload: {
      side,
      bidShare: bidShare.toDecimalPlaces(4).toNumber(),
      bidQuantity: bidQuantity.toString(),
      askQuantity: askQuantity.toString(),
      depth: rule.depth,
    },
  };
}
