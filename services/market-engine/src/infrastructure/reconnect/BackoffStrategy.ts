export interface BackoffOptions {
  /** 初回の上限遅延（ミリ秒） */
  baseDelayMs?: number;
  /** 遅延の上限（ミリ秒） */
  maxDelayMs?: number;
  /** [0, 1) の乱数。テストでは固定値を渡す */
  random?: () => number;
}

/**
 * インフラ層: 指数バックオフ戦略（フルジッター）の実装
 *
 * attempt 回目の遅延は [0, min(MAX, BASE * 2^attempt)] の一様乱数。
 * 複数の接続が同時に切れたときに再接続が一斉に集中しないようにする。
 */
export class BackoffStrategy {
  private attempt = 0;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly random: () => number;

  constructor(options: BackoffOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? 1000; // 1秒
    this.maxDelayMs = options.maxDelayMs ?? 30000; // 30秒
    this.random = options.random ?? Math.random;
  }

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   * @returns 遅延時間（ミリ秒）
   */
  getNextDelay(): number {
    const ceiling = Math.min(this.baseDelayMs * 2 ** this.attempt, this.maxDelayMs);
    this.attempt += 1;
    return Math.floor(this.random() * ceiling);
  }

  /**
   * これまでに払い出した遅延の回数
   */
  get attempts(): number {
    return this.attempt;
  }

  /**
   * バックオフカウンターをリセットする。
   * 接続成功時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
