/**
 * インフラ層: 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続の確立・管理・イベント処理を抽象化する。
 * Node.js 20 には標準の WebSocket がないため、実装は ws パッケージを使用する。
 */

/**
 * 受信データ。テキストフレームは string、バイナリフレームは Buffer 系で届く。
 */
export type WebSocketData = string | Buffer | ArrayBuffer | Buffer[];

export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック
   */
  onMessage(callback: (data: WebSocketData) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): void;

  /**
   * サーバーから ping を受信したときに呼ばれるコールバック（pong は自動で返す）
   */
  onPing(callback: () => void): void;

  send(data: string): void;

  close(): void;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;

  /**
   * 接続を強制終了する（close ハンドシェイクを待たない）
   */
  terminate(): void;
}
