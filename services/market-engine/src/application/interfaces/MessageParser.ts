import type { MarketEvent } from '@/domain/types';

/**
 * 1 フレームを解釈した結果。
 * - events: 下流へ流すイベント（0 件以上）
 * - control: 購読応答など、ストリーム制御のためのフレーム
 * - error: 取引所が返したエラーフレーム
 */
export type ParsedFrame =
  | { kind: 'events'; events: MarketEvent[] }
  | { kind: 'control'; id: number | null }
  | { kind: 'error'; code: number | null; message: string; id: number | null };

/**
 * メッセージパーサーのインターフェイス（インフラ層で実装される）。
 */
export interface MessageParser {
  /**
   * テキストフレームを解釈する。
   * @returns 解釈できない（不正な JSON、未知の形式、値の検証失敗）場合は null
   */
  parse(text: string): ParsedFrame | null;
}
