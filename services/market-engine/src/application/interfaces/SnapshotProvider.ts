import type { Instrument, Snapshot } from '@/domain/types';

/**
 * 板スナップショット取得のインターフェイス（インフラ層で実装される）。
 * Order Book Engine の（再）同期時にのみ使われる。
 */
export interface SnapshotProvider {
  /**
   * @throws 取得に失敗した場合（SnapshotFetchFault を推奨）
   */
  fetchSnapshot(instrument: Instrument): Promise<Snapshot>;
}
