import type { SignalEvent } from '@/domain/types';

/**
 * シグナル配信先（通知ボット、ストリームなど）のインターフェイス。
 *
 * 配信に失敗した場合は DeliveryError で reject する。
 * コア側は再送しない（再送はシンクの責務）。
 */
export interface SignalSink {
  /** ログ・メトリクスのラベルに使う名前 */
  readonly name: string;

  deliver(event: SignalEvent): Promise<void>;
}
