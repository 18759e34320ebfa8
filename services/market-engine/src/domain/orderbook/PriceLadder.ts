import type Decimal from 'decimal.js';
import type { PriceLevel } from '@/domain/types';

export type LadderSide = 'bid' | 'ask';

/**
 * 板の片側（買い or 売り）。
 *
 * 価格の正規化文字列をキーにした Map で点更新を行い、
 * 遠い側から最良気配へ向けて並べた価格インデックスで最良気配と深さ指定の読み取りに答える。
 * 既存レベルの数量変更はインデックスに触れない。
 * 最良気配は常に末尾にあるため、板の先頭付近での追加・削除は要素をほとんど動かさない。
 */
export class PriceLadder {
  private readonly levels = new Map<string, PriceLevel>();
  /** 最良気配が末尾に来る順の価格（買いは昇順、売りは降順）。レベルの追加・削除時のみ更新する */
  private readonly sortedPrices: Decimal[] = [];

  constructor(readonly side: LadderSide) {}

  get size(): number {
    return this.levels.size;
  }

  /**
   * 価格レベルを設定する。数量 0 はレベルの削除。
   */
  set(price: Decimal, quantity: Decimal): void {
    const key = price.toString();
    if (quantity.isZero()) {
      if (this.levels.delete(key)) {
        this.sortedPrices.splice(this.indexOf(price), 1);
      }
      return;
    }

    const existing = this.levels.get(key);
    if (existing) {
      existing.quantity = quantity;
      return;
    }
    this.levels.set(key, { price, quantity });
    this.sortedPrices.splice(this.indexOf(price), 0, price);
  }

  get(price: Decimal): Decimal | undefined {
    return this.levels.get(price.toString())?.quantity;
  }

  clear(): void {
    this.levels.clear();
    this.sortedPrices.length = 0;
  }

  /**
   * 最良気配（買いは最高値、売りは最安値）。
   */
  best(): PriceLevel | null {
    if (this.sortedPrices.length === 0) {
      return null;
    }
    return this.copyLevel(this.sortedPrices[this.sortedPrices.length - 1]);
  }

  /**
   * 最良気配から depth 件のレベルを複製して返す。depth 省略時は全件。
   */
  top(depth?: number): PriceLevel[] {
    const count = Math.min(depth ?? this.sortedPrices.length, this.sortedPrices.length);
    const result: PriceLevel[] = [];
    for (let i = 0; i < count; i++) {
      const level = this.copyLevel(this.sortedPrices[this.sortedPrices.length - 1 - i]);
      if (level) {
        result.push(level);
      }
    }
    return result;
  }

  /**
   * 二分探索で price の挿入位置（存在すればその位置）を返す。
   */
  private indexOf(price: Decimal): number {
    let low = 0;
    let high = this.sortedPrices.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.isFartherThan(this.sortedPrices[mid], price)) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  /**
   * a が b より最良気配から遠いか。
   */
  private isFartherThan(a: Decimal, b: Decimal): boolean {
    return this.side === 'bid' ? a.lessThan(b) : a.greaterThan(b);
  }

  private copyLevel(price: Decimal): PriceLevel | null {
    const level = this.levels.get(price.toString());
    return level ? { price: level.price, quantity: level.quantity } : null;
  }
}
