import axios, { type AxiosInstance, isAxiosError } from 'axios';
import type { Logger } from '@/application/interfaces/Logger';
import type { SnapshotProvider } from '@/application/interfaces/SnapshotProvider';
import { SnapshotFetchFault } from '@/domain/errors';
import type { Instrument, Snapshot } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';
import { toLevelChange } from './BinanceMessageParser';
import { depthSnapshotSchema } from './messages/BinanceRawMessage';

export interface BinanceSnapshotClientOptions {
  /** REST API のベース URL（例: https://api.binance.com） */
  baseUrl: string;
  /** 取得するレベル数（Binance の上限は 5000） */
  limit?: number;
  timeoutMs?: number;
  logger?: Logger;
  /** テスト用に差し替える HTTP クライアント */
  http?: AxiosInstance;
}

/**
 * インフラ層: REST による板スナップショット取得（SnapshotProvider 実装）
 *
 * GET /api/v3/depth を呼び、応答を検証して Snapshot に変換する。
 * 通信失敗・HTTP エラー・応答形式の不一致はすべて SnapshotFetchFault として返す。
 */
export class BinanceSnapshotClient implements SnapshotProvider {
  private readonly http: AxiosInstance;
  private readonly limit: number;
  private readonly logger: Logger;

  constructor(options: BinanceSnapshotClientOptions) {
    this.limit = options.limit ?? 1000;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'BinanceSnapshotClient' });
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 10_000,
      });
  }

  async fetchSnapshot(instrument: Instrument): Promise<Snapshot> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>('/api/v3/depth', {
        params: { symbol: instrument, limit: this.limit },
      });
      body = response.data;
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      throw new SnapshotFetchFault(
        instrument,
        status === undefined
          ? `depth snapshot request for ${instrument} failed`
          : `depth snapshot request for ${instrument} failed with status ${status}`,
        { cause: error }
      );
    }

    const parsed = depthSnapshotSchema.safeParse(body);
    if (!parsed.success) {
      throw new SnapshotFetchFault(instrument, `unexpected depth snapshot payload for ${instrument}`, {
        cause: parsed.error,
      });
    }

    this.logger.debug('depth snapshot fetched', {
      instrument,
      lastUpdateId: parsed.data.lastUpdateId,
      bids: parsed.data.bids.length,
      asks: parsed.data.asks.length,
    });

    return {
      instrument,
      lastUpdateId: parsed.data.lastUpdateId,
      bids: parsed.data.bids.map(toLevelChange),
      asks: parsed.data.asks.map(toLevelChange),
    };
  }
}
