import Redis from 'ioredis';
import type { SignalSink } from '@/application/interfaces/SignalSink';
import { DeliveryError } from '@/domain/errors';
import type { SignalEvent } from '@/domain/types';

export interface RedisSignalSinkOptions {
  /** 書き込み先の Stream 名 */
  stream?: string;
  /** XADD の MAXLEN ~ に渡す概算上限。省略時はトリムしない */
  maxLength?: number;
}

/**
 * インフラ層: Redis Stream へのシグナル配信
 *
 * 責務: SignalEvent を Redis Stream に XADD する。失敗は DeliveryError として呼び出し側に返し、再送はしない。
 */
export class RedisSignalSink implements SignalSink {
  readonly name = 'redis';
  private readonly redis: Redis;
  private readonly stream: string;
  private readonly maxLength?: number;

  /**
   * @param redisUrl Redis 接続 URL
   */
  constructor(redisUrl: string, options: RedisSignalSinkOptions = {}) {
    this.redis = new Redis(redisUrl);
    this.stream = options.stream ?? 'signals';
    this.maxLength = options.maxLength;
  }

  async deliver(event: SignalEvent): Promise<void> {
    const fields = [
      'id',
      event.id,
      'instrument',
      event.instrument,
      'ruleId',
      event.ruleId,
      'kind',
      event.kind,
      'ts',
      event.timestamp.toString(),
      'severity',
      event.severity,
      'payload',
      JSON.stringify(event.payload),
    ];

    try {
      if (this.maxLength === undefined) {
        await this.redis.xadd(this.stream, '*', ...fields);
      } else {
        await this.redis.xadd(this.stream, 'MAXLEN', '~', this.maxLength, '*', ...fields);
      }
    } catch (error) {
      throw new DeliveryError(this.name, `failed to append signal ${event.id} to ${this.stream}`, { cause: error });
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }
}
