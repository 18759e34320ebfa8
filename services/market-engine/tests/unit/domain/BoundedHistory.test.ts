import { describe, expect, it } from 'vitest';
import { BoundedHistory } from '@/domain/BoundedHistory';

describe('BoundedHistory', () => {
  it('上限を超えると古いものから捨てる', () => {
    const history = new BoundedHistory<number>(3);
    for (const value of [1, 2, 3, 4, 5]) {
      history.push(value);
    }

    expect(history.length).toBe(3);
    expect(history.last(10)).toEqual([3, 4, 5]);
    expect(history.latest()).toBe(5);
  });

  it('last(n) は末尾 n 件を古い順で返す', () => {
    const history = new BoundedHistory<string>(5);
    history.push('a');
    history.push('b');
    history.push('c');

    expect(history.last(2)).toEqual(['b', 'c']);
    expect(history.last(0)).toEqual([]);
  });

  it('上限が 0 以下ならエラー', () => {
    expect(() => new BoundedHistory<number>(0)).toThrow(RangeError);
  });
});
