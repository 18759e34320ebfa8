import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DeliveryError } from '@/domain/errors';
import type { SignalEvent } from '@/domain/types';
import { RedisSignalSink } from '@/infrastructure/redis/RedisSignalSink';

const { mockXadd, mockQuit, constructedUrls } = vi.hoisted(() => ({
  mockXadd: vi.fn(),
  mockQuit: vi.fn(),
  constructedUrls: [] as string[],
}));

// ioredis をモック
vi.mock('ioredis', () => {
  class MockRedis {
    xadd = mockXadd;
    quit = mockQuit;

    constructor(url: string) {
      constructedUrls.push(url);
    }
  }

  return {
    default: MockRedis,
  };
});

const event: SignalEvent = {
  id: 'sig-1',
  instrument: 'BTCUSDT',
  ruleId: 'volume-spike-1m',
  kind: 'volume_spike',
  timestamp: 120_000,
  severity: 'critical',
  payload: { ratio: 50, volume: '50' },
};

const expectedFields = [
  'id',
  'sig-1',
  'instrument',
  'BTCUSDT',
  'ruleId',
  'volume-spike-1m',
  'kind',
  'volume_spike',
  'ts',
  '120000',
  'severity',
  'critical',
  'payload',
  '{"ratio":50,"volume":"50"}',
];

/**
 * 単体テスト: RedisSignalSink
 *
 * - XADD のフィールド
 * - MAXLEN によるトリム
 * - Redis エラー時の DeliveryError
 */
describe('RedisSignalSink', () => {
  beforeEach(() => {
    mockXadd.mockReset();
    mockQuit.mockReset();
    mockXadd.mockResolvedValue('1700000000000-0');
    mockQuit.mockResolvedValue('OK');
    constructedUrls.length = 0;
  });

  it('シグナルを Stream に XADD する', async () => {
    const sink = new RedisSignalSink('redis://localhost:6379/0');

    await sink.deliver(event);

    expect(constructedUrls).toEqual(['redis://localhost:6379/0']);
    expect(mockXadd).toHaveBeenCalledWith('signals', '*', ...expectedFields);
  });

  it('maxLength を指定すると MAXLEN ~ でトリムする', async () => {
    const sink = new RedisSignalSink('redis://localhost:6379/0', { stream: 'alerts', maxLength: 10_000 });

    await sink.deliver(event);

    expect(mockXadd).toHaveBeenCalledWith('alerts', 'MAXLEN', '~', 10_000, '*', ...expectedFields);
  });

  it('Redis エラーは DeliveryError にして返す', async () => {
    const cause = new Error('Connection refused');
    mockXadd.mockRejectedValue(cause);
    const sink = new RedisSignalSink('redis://localhost:6379/0');

    const error = await sink.deliver(event).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({
      sink: 'redis',
      message: 'failed to append signal sig-1 to signals',
      cause,
    });
  });

  it('close() で接続を閉じる', async () => {
    const sink = new RedisSignalSink('redis://localhost:6379/0');

    await sink.close();

    expect(mockQuit).toHaveBeenCalledTimes(1);
  });
});
