import type { Instrument } from '@/domain/types';

/**
 * アプリケーション層: 取引所 WebSocket アダプタの共通インターフェイス
 *
 * 責務: アプリケーション層が「必要な契約」を定義する（実装はインフラ層が担当）。
 * 受信フレームはテキストに復号してからコールバックに渡す。解釈は MessageParser の責務。
 */
export interface MarketDataAdapter {
  /**
   * WebSocket 接続を確立し、指定した銘柄を購読する。
   * @returns 接続が確立されたら解決される。失敗した場合は reject
   */
  connect(instruments: readonly Instrument[]): Promise<void>;

  /**
   * 接続を閉じる。close コールバックは呼ばれない。
   */
  disconnect(): void;

  /**
   * 接続を強制終了する。close コールバックが呼ばれ、再接続経路に入る。
   */
  terminate(): void;

  /**
   * 接続中なら購読リクエストを送る。
   */
  subscribe(instruments: readonly Instrument[]): void;

  unsubscribe(instruments: readonly Instrument[]): void;

  setOnMessage(callback: (text: string) => void): void;

  setOnClose(callback: (code: number, reason: string) => void): void;

  setOnError(callback: (error: Error) => void): void;

  /**
   * サーバーからの ping など、データ以外の生存確認を受け取ったときのコールバック
   */
  setOnHeartbeat(callback: () => void): void;
}
