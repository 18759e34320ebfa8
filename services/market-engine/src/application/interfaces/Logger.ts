/**
 * ロガーインターフェース
 *
 * 構造化ログを出力するためのインターフェース。
 * 実装は pino を使用するが、テスト容易性のためにインターフェースを定義。
 * エラーは meta の `err` キーに渡す（pino のシリアライザが stack を展開する）。
 */
export interface Logger {
  /**
   * デバッグレベルのログを出力
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（オプション）
   */
  debug(msg: string, meta?: object): void;

  info(msg: string, meta?: object): void;

  warn(msg: string, meta?: object): void;

  /**
   * エラーレベルのログを出力
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（オプション）。例外は `{ err }` で渡す
   */
  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * コンテキスト（component, instrument など）を自動付与するために使用
   * @param bindings 子ロガーに付与するコンテキスト情報
   * @returns 新しいロガーインスタンス
   */
  child(bindings: object): Logger;
}
