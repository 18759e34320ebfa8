/**
 * 上限付きの追記専用履歴。上限を超えると古いものから捨てる。
 */
export class BoundedHistory<T> {
  private readonly items: T[] = [];

  constructor(private readonly capacity: number) {
    if (capacity <= 0) {
      throw new RangeError('capacity must be positive');
    }
  }

  get length(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  /**
   * 末尾 n 件を時系列順（古い→新しい）で返す。
   */
  last(n: number): T[] {
    if (n <= 0) {
      return [];
    }
    return this.items.slice(-n);
  }

  latest(): T | undefined {
    return this.items[this.items.length - 1];
  }
}
