import type { Logger } from '@/application/interfaces/Logger';
import type { MarketEventConsumer } from '@/application/interfaces/MarketEventConsumer';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { SnapshotProvider } from '@/application/interfaces/SnapshotProvider';
import { SequenceGapFault, SnapshotFetchFault } from '@/domain/errors';
import { OrderBook } from '@/domain/orderbook/OrderBook';
import type { BookState, DepthUpdate, Instrument, Ladder, MarketEvent, Snapshot } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';

export interface OrderBookEngineOptions {
  /** 1 回の同期サイクルで許すスナップショット取得の試行回数 */
  maxSnapshotAttempts?: number;
  /** 試行間の待機時間（ミリ秒） */
  snapshotRetryDelayMs?: number;
  /** 同期中に保持する差分の上限。超えると古いものから捨てる */
  maxBufferedUpdates?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  now?: () => number;
}

export type BookStateListener = (instrument: Instrument, from: BookState, to: BookState, reason: string) => void;

/**
 * 同期を諦めた銘柄の通知内容。
 */
export interface BookSyncAlert {
  instrument: Instrument;
  attempts: number;
  reason: string;
  at: number;
}

export type BookSyncAlertListener = (alert: BookSyncAlert) => void;

interface BookEntry {
  book: OrderBook;
  /** 同期中に受信した差分（到着順） */
  buffer: DepthUpdate[];
  /** 同期サイクルの世代。購読解除・再同期で進め、古いスナップショット結果を捨てる */
  generation: number;
  attempts: number;
  /** スナップショット適用済みで、橋渡しとなる最初の差分を待っている */
  awaitingBridge: boolean;
  retryTimer: NodeJS.Timeout | null;
  crossed: boolean;
}

/**
 * アプリケーション層: 板レプリカの維持
 *
 * 責務: スナップショット + 差分の突き合わせで銘柄ごとの板を live に保つ。
 * 1. 購読開始で syncing に入り、差分を到着順にバッファする
 * 2. SnapshotProvider からスナップショットを取得する
 * 3. スナップショット以前の差分を捨てる
 * 4. 最初の差分が U <= lastUpdateId + 1 <= u を満たし、以降が連続していることを確認する
 * 5. スナップショット → バッファの順に適用して live に遷移する
 * 6. live 中は U == 直前の u + 1 の差分のみ適用し、不連続なら desynced に落として 2 からやり直す
 *
 * 板への書き込みはすべて同期的なハンドラ内で完結するため、読み取り側が途中状態を見ることはない。
 */
export class OrderBookEngine implements MarketEventConsumer {
  private readonly books = new Map<Instrument, BookEntry>();
  private readonly stateListeners: BookStateListener[] = [];
  private readonly alertListeners: BookSyncAlertListener[] = [];
  private readonly maxSnapshotAttempts: number;
  private readonly snapshotRetryDelayMs: number;
  private readonly maxBufferedUpdates: number;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly now: () => number;

  constructor(
    private readonly snapshotProvider: SnapshotProvider,
    options: OrderBookEngineOptions = {}
  ) {
    this.maxSnapshotAttempts = options.maxSnapshotAttempts ?? 5;
    this.snapshotRetryDelayMs = options.snapshotRetryDelayMs ?? 1000;
    this.maxBufferedUpdates = options.maxBufferedUpdates ?? 10_000;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'OrderBookEngine' });
    this.metricsCollector = options.metricsCollector;
    this.now = options.now ?? Date.now;
  }

  onStateChange(listener: BookStateListener): void {
    this.stateListeners.push(listener);
  }

  onSyncAlert(listener: BookSyncAlertListener): void {
    this.alertListeners.push(listener);
  }

  /**
   * 銘柄の板を作成し、同期を開始する。既に購読中なら何もしない。
   */
  subscribe(instrument: Instrument): void {
    if (this.books.has(instrument)) {
      return;
    }
    const entry: BookEntry = {
      book: new OrderBook(instrument),
      buffer: [],
      generation: 0,
      attempts: 0,
      awaitingBridge: false,
      retryTimer: null,
      crossed: false,
    };
    this.books.set(instrument, entry);
    this.metricsCollector?.recordBookState(instrument, entry.book.state);
    this.logger.info('order book subscribed', { instrument });
    this.startSync(entry, 'subscribed');
  }

  /**
   * 板を破棄する。取得中のスナップショットが後から届いても適用されない。
   */
  unsubscribe(instrument: Instrument): void {
    const entry = this.books.get(instrument);
    if (!entry) {
      return;
    }
    entry.generation += 1;
    this.clearRetryTimer(entry);
    entry.buffer = [];
    this.books.delete(instrument);
    this.logger.info('order book unsubscribed', { instrument });
  }

  /**
   * 手動で再同期する（試行回数もリセットする）。
   */
  resync(instrument: Instrument): void {
    const entry = this.books.get(instrument);
    if (!entry) {
      return;
    }
    entry.attempts = 0;
    this.startSync(entry, 'manual resync');
  }

  onEvent(event: MarketEvent): void {
    switch (event.type) {
      case 'depth':
        this.handleDepthUpdate(event);
        return;
      case 'connection':
        if (event.kind === 'dropped') {
          this.markDesynced(event.instruments, `connection dropped${event.reason ? `: ${event.reason}` : ''}`);
        } else {
          this.resyncEach(event.instruments, 'connection resumed');
        }
        return;
      case 'trade':
        return;
    }
  }

  /**
   * 差分板更新を処理する。
   */
  handleDepthUpdate(update: DepthUpdate): void {
    const entry = this.books.get(update.instrument);
    if (!entry) {
      return;
    }
    const { book } = entry;

    if (entry.awaitingBridge) {
      this.bridge(entry, update);
      return;
    }

    if (book.state !== 'live') {
      this.bufferUpdate(entry, update);
      return;
    }

    const expected = book.lastAppliedUpdateId + 1;
    if (update.lastUpdateId < expected) {
      // 再送された古い差分
      this.logger.debug('stale depth update ignored', {
        instrument: update.instrument,
        lastUpdateId: update.lastUpdateId,
        lastApplied: book.lastAppliedUpdateId,
      });
      return;
    }
    if (update.firstUpdateId !== expected) {
      const fault = new SequenceGapFault(update.instrument, expected, update.firstUpdateId);
      this.metricsCollector?.incrementError('sequence_gap');
      this.logger.warn('sequence gap detected', { instrument: update.instrument, err: fault });
      this.transition(entry, 'desynced', fault.message);
      entry.buffer = [update];
      this.startSync(entry, 'sequence gap');
      return;
    }

    book.applyUpdate(update);
    this.checkCrossed(entry);
  }

  /**
   * 現在の板のコピーを返す。未購読なら null。
   */
  currentBook(instrument: Instrument, depth?: number): Ladder | null {
    const entry = this.books.get(instrument);
    return entry ? entry.book.toLadder(depth) : null;
  }

  state(instrument: Instrument): BookState | null {
    return this.books.get(instrument)?.book.state ?? null;
  }

  states(): Record<Instrument, BookState> {
    const result: Record<Instrument, BookState> = {};
    for (const [instrument, entry] of this.books) {
      result[instrument] = entry.book.state;
    }
    return result;
  }

  instruments(): Instrument[] {
    return [...this.books.keys()];
  }

  /**
   * すべての板を破棄する（シャットダウン用）。
   */
  close(): void {
    for (const instrument of [...this.books.keys()]) {
      this.unsubscribe(instrument);
    }
  }

  private startSync(entry: BookEntry, reason: string): void {
    entry.generation += 1;
    entry.awaitingBridge = false;
    this.clearRetryTimer(entry);
    this.transition(entry, 'syncing', reason);
    void this.synchronize(entry, entry.generation);
  }

  /**
   * スナップショットを取得して突き合わせる。例外は外に出さない。
   */
  private async synchronize(entry: BookEntry, generation: number): Promise<void> {
    const { instrument } = entry.book;
    this.metricsCollector?.incrementResync(instrument);

    let snapshot: Snapshot;
    try {
      snapshot = await this.snapshotProvider.fetchSnapshot(instrument);
    } catch (error) {
      if (!this.isCurrent(entry, generation)) {
        return;
      }
      this.metricsCollector?.incrementError('snapshot_fetch_error');
      this.logger.warn('snapshot fetch failed', { instrument, attempt: entry.attempts + 1, err: error });
      this.handleAttemptFailure(entry, 'snapshot fetch failed', error);
      return;
    }

    if (!this.isCurrent(entry, generation)) {
      return;
    }
    this.reconcile(entry, snapshot);
  }

  private reconcile(entry: BookEntry, snapshot: Snapshot): void {
    const { book } = entry;
    const boundary = snapshot.lastUpdateId + 1;
    const usable = entry.buffer.filter((update) => update.lastUpdateId >= boundary);
    entry.buffer = usable;

    if (usable.length === 0) {
      // 次に届く差分で橋渡しを確認する
      book.applySnapshot(snapshot);
      entry.awaitingBridge = true;
      this.logger.debug('snapshot applied, awaiting first update', {
        instrument: book.instrument,
        lastUpdateId: snapshot.lastUpdateId,
      });
      return;
    }

    const first = usable[0];
    if (first.firstUpdateId > boundary) {
      this.handleAttemptFailure(entry, `snapshot ${snapshot.lastUpdateId} is older than buffered update ${first.firstUpdateId}`);
      return;
    }
    for (let i = 1; i < usable.length; i++) {
      if (usable[i].firstUpdateId !== usable[i - 1].lastUpdateId + 1) {
        this.handleAttemptFailure(entry, `gap in buffered updates at ${usable[i].firstUpdateId}`);
        return;
      }
    }

    book.applySnapshot(snapshot);
    for (const update of usable) {
      book.applyUpdate(update);
    }
    entry.buffer = [];
    entry.attempts = 0;
    this.transition(entry, 'live', `synchronized at ${book.lastAppliedUpdateId}`);
    this.checkCrossed(entry);
  }

  /**
   * スナップショット適用後、最初に届いた差分で橋渡しを確認する。
   */
  private bridge(entry: BookEntry, update: DepthUpdate): void {
    const { book } = entry;
    const boundary = book.lastAppliedUpdateId + 1;
    if (update.lastUpdateId < boundary) {
      return;
    }
    if (update.firstUpdateId > boundary) {
      entry.awaitingBridge = false;
      entry.buffer = [update];
      this.handleAttemptFailure(entry, `update ${update.firstUpdateId} does not follow snapshot ${book.lastAppliedUpdateId}`);
      return;
    }
    entry.awaitingBridge = false;
    book.applyUpdate(update);
    entry.attempts = 0;
    this.transition(entry, 'live', `synchronized at ${book.lastAppliedUpdateId}`);
    this.checkCrossed(entry);
  }

  private handleAttemptFailure(entry: BookEntry, reason: string, cause?: unknown): void {
    const { instrument } = entry.book;
    entry.attempts += 1;

    if (entry.attempts >= this.maxSnapshotAttempts) {
      const fault = new SnapshotFetchFault(
        instrument,
        `gave up synchronizing ${instrument} after ${entry.attempts} attempts: ${reason}`,
        { cause }
      );
      this.logger.error('order book synchronization exhausted', { instrument, err: fault });
      this.transition(entry, 'desynced', fault.message);
      const alert: BookSyncAlert = { instrument, attempts: entry.attempts, reason, at: this.now() };
      for (const listener of this.alertListeners) {
        listener(alert);
      }
      return;
    }

    this.logger.info('retrying order book synchronization', { instrument, attempt: entry.attempts, reason });
    const generation = entry.generation;
    this.clearRetryTimer(entry);
    entry.retryTimer = setTimeout(() => {
      entry.retryTimer = null;
      if (this.isCurrent(entry, generation)) {
        void this.synchronize(entry, generation);
      }
    }, this.snapshotRetryDelayMs);
  }

  private markDesynced(instruments: readonly Instrument[], reason: string): void {
    for (const entry of this.entriesOf(instruments)) {
      entry.generation += 1;
      entry.awaitingBridge = false;
      this.clearRetryTimer(entry);
      this.transition(entry, 'desynced', reason);
    }
  }

  private resyncEach(instruments: readonly Instrument[], reason: string): void {
    for (const entry of this.entriesOf(instruments)) {
      entry.attempts = 0;
      this.startSync(entry, reason);
    }
  }

  private entriesOf(instruments: readonly Instrument[]): BookEntry[] {
    const entries: BookEntry[] = [];
    for (const instrument of instruments) {
      const entry = this.books.get(instrument);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  private bufferUpdate(entry: BookEntry, update: DepthUpdate): void {
    entry.buffer.push(update);
    if (entry.buffer.length > this.maxBufferedUpdates) {
      entry.buffer.shift();
    }
  }

  private transition(entry: BookEntry, to: BookState, reason: string): void {
    const { book } = entry;
    const from = book.state;
    if (from === to) {
      return;
    }
    book.setState(to);
    this.metricsCollector?.recordBookState(book.instrument, to);
    this.logger.info('order book state changed', { instrument: book.instrument, from, to, reason });
    for (const listener of this.stateListeners) {
      listener(book.instrument, from, to, reason);
    }
  }

  private checkCrossed(entry: BookEntry): void {
    const crossed = entry.book.isCrossed();
    if (crossed && !entry.crossed) {
      this.logger.warn('order book crossed', {
        instrument: entry.book.instrument,
        lastUpdateId: entry.book.lastAppliedUpdateId,
      });
    }
    entry.crossed = crossed;
  }

  private isCurrent(entry: BookEntry, generation: number): boolean {
    return entry.generation === generation && this.books.get(entry.book.instrument) === entry;
  }

  private clearRetryTimer(entry: BookEntry): void {
    if (entry.retryTimer) {
      clearTimeout(entry.retryTimer);
      entry.retryTimer = null;
    }
  }
}
