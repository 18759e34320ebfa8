import { describe, expect, it } from 'vitest';
import { RecentIdWindow } from '@/application/candle/RecentIdWindow';

describe('RecentIdWindow', () => {
  it('記録済みの ID には false を返す', () => {
    const window = new RecentIdWindow(3);

    expect(window.add(1)).toBe(true);
    expect(window.add(1)).toBe(false);
    expect(window.has(1)).toBe(true);
  });

  it('上限を超えると古い ID から忘れる', () => {
    const window = new RecentIdWindow(2);
    window.add(1);
    window.add(2);
    window.add(3);

    expect(window.size).toBe(2);
    expect(window.has(1)).toBe(false);
    expect(window.has(2)).toBe(true);
    expect(window.has(3)).toBe(true);
  });

  it('上限が 0 以下ならエラー', () => {
    expect(() => new RecentIdWindow(0)).toThrow(RangeError);
  });
});
