import type { BookState, DepthUpdate, Instrument, Ladder, PriceLevel, Snapshot } from '@/domain/types';
import { PriceLadder } from './PriceLadder';

/**
 * ドメイン層: 1 銘柄分の板レプリカ
 *
 * 状態遷移の判断（いつスナップショットを取り直すか等）は OrderBookEngine が持つ。
 * このクラスは「適用」と「読み取り」だけを提供し、適用は常に同期的に完了する。
 */
export class OrderBook {
  private readonly bids = new PriceLadder('bid');
  private readonly asks = new PriceLadder('ask');
  private _state: BookState = 'syncing';
  private _lastAppliedUpdateId = 0;

  constructor(readonly instrument: Instrument) {}

  get state(): BookState {
    return this._state;
  }

  get lastAppliedUpdateId(): number {
    return this._lastAppliedUpdateId;
  }

  setState(state: BookState): void {
    this._state = state;
  }

  /**
   * スナップショットで板を置き換える。数量 0 のレベルは取り込まない。
   */
  applySnapshot(snapshot: Snapshot): void {
    this.bids.clear();
    this.asks.clear();
    for (const level of snapshot.bids) {
      this.bids.set(level.price, level.quantity);
    }
    for (const level of snapshot.asks) {
      this.asks.set(level.price, level.quantity);
    }
    this._lastAppliedUpdateId = snapshot.lastUpdateId;
  }

  /**
   * 差分を適用する。連続性の検証は呼び出し側で済ませておくこと。
   */
  applyUpdate(update: DepthUpdate): void {
    for (const change of update.bidChanges) {
      this.bids.set(change.price, change.quantity);
    }
    for (const change of update.askChanges) {
      this.asks.set(change.price, change.quantity);
    }
    this._lastAppliedUpdateId = update.lastUpdateId;
  }

  bestBid(): PriceLevel | null {
    return this.bids.best();
  }

  bestAsk(): PriceLevel | null {
    return this.asks.best();
  }

  /**
   * 最良気配同士が交差しているか（買い最良 >= 売り最良）。
   */
  isCrossed(): boolean {
    const bid = this.bids.best();
    const ask = this.asks.best();
    return bid !== null && ask !== null && bid.price.greaterThanOrEqualTo(ask.price);
  }

  /**
   * 読み取り用のコピーを返す。
   * @param depth 片側あたりのレベル数（省略時は全件）
   */
  toLadder(depth?: number): Ladder {
    return {
      instrument: this.instrument,
      state: this._state,
      lastUpdateId: this._lastAppliedUpdateId,
      bids: this.bids.top(depth),
      asks: this.asks.top(depth),
    };
  }
}
