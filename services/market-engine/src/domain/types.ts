import type Decimal from 'decimal.js';

/**
 * ドメイン層: マーケットデータと算出結果の型定義
 *
 * 注意: ここには I/O を持たない値オブジェクトのみを置く。
 * 価格・数量は浮動小数の誤差を避けるため decimal.js の Decimal で保持する。
 */

/**
 * 取引ペア（例: 'BTCUSDT'）。大文字に正規化して扱う。
 */
export type Instrument = string;

/**
 * 板の 1 価格レベルに対する変更。quantity が 0 の場合はレベルの削除を意味する。
 */
export interface PriceLevelChange {
  price: Decimal;
  quantity: Decimal;
}

/**
 * 差分板更新イベント。
 * 更新 ID は銘柄ごとに連続している必要がある（次の firstUpdateId = 前の lastUpdateId + 1）。
 */
export interface DepthUpdate {
  type: 'depth';
  instrument: Instrument;
  firstUpdateId: number;
  lastUpdateId: number;
  /** 取引所側のイベント時刻（エポックミリ秒） */
  eventTime: number;
  bidChanges: PriceLevelChange[];
  askChanges: PriceLevelChange[];
}

/**
 * REST で取得する板の全量スナップショット。
 */
export interface Snapshot {
  instrument: Instrument;
  lastUpdateId: number;
  bids: PriceLevelChange[];
  asks: PriceLevelChange[];
}

export type TradeSide = 'buy' | 'sell';

/**
 * 約定イベント。side はテイカー側。
 */
export interface Trade {
  type: 'trade';
  instrument: Instrument;
  tradeId: number;
  price: Decimal;
  quantity: Decimal;
  side: TradeSide;
  /** 約定時刻（エポックミリ秒） */
  timestamp: number;
}

export type ConnectionEventKind = 'dropped' | 'resumed';

/**
 * ストリーム接続の断・復帰を下流に知らせるイベント。
 * instruments は発行元の接続が受け持つ銘柄で、影響はこの範囲に限られる。
 */
export interface ConnectionEvent {
  type: 'connection';
  kind: ConnectionEventKind;
  instruments: readonly Instrument[];
  at: number;
  reason?: string;
}

/**
 * ストリーム接続の状態。disconnected → connecting → connected の順に遷移する。
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/**
 * Stream Client が下流に配信するイベント。到着順は保証される。
 */
export type MarketEvent = DepthUpdate | Trade | ConnectionEvent;

/**
 * 板の同期状態。
 */
export type BookState = 'syncing' | 'live' | 'desynced';

/**
 * 読み取り用に複製された価格レベル。
 */
export interface PriceLevel {
  price: Decimal;
  quantity: Decimal;
}

/**
 * 板の読み取り結果（コピー）。state が live 以外の場合は値が古い可能性がある。
 */
export interface Ladder {
  instrument: Instrument;
  state: BookState;
  lastUpdateId: number;
  /** 価格の降順 */
  bids: PriceLevel[];
  /** 価格の昇順 */
  asks: PriceLevel[];
}

/**
 * OHLCV ローソク足。closed になった時点で凍結され、Signal Engine に引き渡される。
 */
export interface Candle {
  instrument: Instrument;
  /** 足の長さ（ミリ秒） */
  interval: number;
  /** バケット開始時刻（エポックミリ秒） */
  bucketStart: number;
  open: Decimal;
  high: Decimal;
  low: Decimal;
  close: Decimal;
  volume: Decimal;
  tradeCount: number;
  closed: boolean;
  /** 約定がなかったバケットを埋めるために生成された足 */
  synthetic: boolean;
}

export type Severity = 'info' | 'warning' | 'critical';

export type SignalPayloadValue = string | number | boolean;

/**
 * シグナルイベント。発行後は不変。
 */
export interface SignalEvent {
  readonly id: string;
  readonly instrument: Instrument;
  readonly ruleId: string;
  /** ルール種別。板同期の失敗など内部起因のものは 'system' */
  readonly kind: string;
  readonly timestamp: number;
  readonly severity: Severity;
  readonly payload: Readonly<Record<string, SignalPayloadValue>>;
}
