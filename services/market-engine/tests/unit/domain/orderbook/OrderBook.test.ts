import { describe, expect, it } from 'vitest';
import { OrderBook } from '@/domain/orderbook/OrderBook';
import { depth, snapshot } from '../../helpers/factories';

describe('OrderBook', () => {
  it('スナップショットで板を置き換え、数量 0 のレベルは取り込まない', () => {
    const book = new OrderBook('BTCUSDT');
    book.applySnapshot(snapshot(5, { bids: [[1, 1]] }));
    book.applySnapshot(snapshot(100, { bids: [['10.0', 5], [9, 0]], asks: [[11, 2]] }));

    const ladder = book.toLadder();
    expect(ladder.lastUpdateId).toBe(100);
    expect(ladder.bids.map((level) => [level.price.toString(), level.quantity.toString()])).toEqual([['10', '5']]);
    expect(ladder.asks.map((level) => [level.price.toString(), level.quantity.toString()])).toEqual([['11', '2']]);
  });

  it('差分を適用すると lastAppliedUpdateId が進む', () => {
    const book = new OrderBook('BTCUSDT');
    book.applySnapshot(snapshot(100, { bids: [['10.0', 5]] }));

    book.applyUpdate(depth(101, 101, { bids: [['10.0', 0]], asks: [[12, 1]] }));

    expect(book.lastAppliedUpdateId).toBe(101);
    expect(book.toLadder().bids).toEqual([]);
    expect(book.bestAsk()?.price.toString()).toBe('12');
  });

  it('最良買い >= 最良売りなら交差とみなす', () => {
    const book = new OrderBook('BTCUSDT');
    book.applySnapshot(snapshot(1, { bids: [[10, 1]], asks: [[11, 1]] }));
    expect(book.isCrossed()).toBe(false);

    book.applyUpdate(depth(2, 2, { bids: [[11, 1]] }));
    expect(book.isCrossed()).toBe(true);
  });

  it('toLadder(depth) は片側あたりの件数を制限し、状態を含める', () => {
    const book = new OrderBook('ETHUSDT');
    book.applySnapshot(snapshot(7, { bids: [[3, 1], [2, 1], [1, 1]], asks: [[4, 1], [5, 1]] }, 'ETHUSDT'));
    book.setState('live');

    const ladder = book.toLadder(1);
    expect(ladder.instrument).toBe('ETHUSDT');
    expect(ladder.state).toBe('live');
    expect(ladder.bids.map((level) => level.price.toNumber())).toEqual([3]);
    expect(ladder.asks.map((level) => level.price.toNumber())).toEqual([4]);
  });
});
