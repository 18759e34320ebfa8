import type { AnomalyKind } from '@/domain/errors';
import type { BookState, Severity } from '@/domain/types';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: メトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 受信イベント数をカウント
   * @param type イベント種別（depth, trade）
   * @param instrument 銘柄（BTCUSDT など）
   */
  incrementReceived(type: string, instrument: string): void;

  /**
   * 破棄した不正フレーム数をカウント
   */
  incrementMalformed(): void;

  /**
   * エラー数をカウント
   * @param errorType エラータイプ（snapshot_fetch_error, api_error など）
   */
  incrementError(errorType: string): void;

  /**
   * 再接続回数をカウント
   */
  incrementReconnect(): void;

  /**
   * 板の状態遷移を記録
   */
  recordBookState(instrument: string, state: BookState): void;

  /**
   * 板の再同期（スナップショット取得）回数をカウント
   */
  incrementResync(instrument: string): void;

  /**
   * 遅延・重複約定をカウント
   */
  incrementAnomaly(instrument: string, kind: AnomalyKind): void;

  /**
   * 確定した足の数をカウント
   * @param interval 足の長さのラベル（1m など）
   */
  incrementCandleClosed(instrument: string, interval: string, synthetic: boolean): void;

  incrementSignal(ruleId: string, severity: Severity): void;

  incrementRuleFailure(ruleId: string): void;

  incrementDeliveryFailure(sink: string): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   * @returns Prometheus 形式のメトリクス文字列
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
