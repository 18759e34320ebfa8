/**
 * 直近 capacity 件の ID を記憶する重複検知用ウィンドウ。
 */
export class RecentIdWindow {
  private readonly ids = new Set<number>();
  private readonly order: number[] = [];

  constructor(private readonly capacity: number) {
    if (capacity <= 0) {
      throw new RangeError('capacity must be positive');
    }
  }

  has(id: number): boolean {
    return this.ids.has(id);
  }

  /**
   * ID を記録する。上限を超えた分は古いものから忘れる。
   * @returns 新規の ID なら true、既に記録済みなら false
   */
  add(id: number): boolean {
    if (this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    this.order.push(id);
    if (this.order.length > this.capacity) {
      const evicted = this.order.shift();
      if (evicted !== undefined) {
        this.ids.delete(evicted);
      }
    }
    return true;
  }

  get size(): number {
    return this.ids.size;
  }
}
