import { beforeEach, describe, expect, it } from 'vitest';
import { SignalDispatcher } from '@/application/dispatch/SignalDispatcher';
import type { SignalSink } from '@/application/interfaces/SignalSink';
import { DeliveryError } from '@/domain/errors';
import type { SignalEvent } from '@/domain/types';
import { type Deferred, deferred, settle } from '../../helpers/factories';
import { LoggerMock } from '../../helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '../../helpers/mocks/MetricsCollectorMock';

function signal(id: string, instrument = 'BTCUSDT'): SignalEvent {
  return {
    id,
    instrument,
    ruleId: 'volume-spike-1m',
    kind: 'volume_spike',
    timestamp: 60_000,
    severity: 'warning',
    payload: { ratio: 3 },
  };
}

/**
 * 配信の開始と完了をテストから制御できるシンク
 */
class ControlledSink implements SignalSink {
  readonly started: string[] = [];
  private readonly pending: Deferred<void>[] = [];

  constructor(readonly name: string) {}

  deliver(event: SignalEvent): Promise<void> {
    this.started.push(event.id);
    const delivery = deferred<void>();
    this.pending.push(delivery);
    return delivery.promise;
  }

  complete(index: number): void {
    this.pending[index].resolve();
  }

  fail(index: number, error: unknown): void {
    this.pending[index].reject(error);
  }
}

class ImmediateSink implements SignalSink {
  readonly name = 'immediate';
  readonly delivered: string[] = [];

  async deliver(event: SignalEvent): Promise<void> {
    this.delivered.push(event.id);
  }
}

/**
 * 単体テスト: SignalDispatcher
 */
describe('SignalDispatcher', () => {
  let logger: LoggerMock;
  let metrics: MetricsCollectorMock;
  let dispatcher: SignalDispatcher;

  beforeEach(() => {
    logger = new LoggerMock();
    metrics = new MetricsCollectorMock();
    dispatcher = new SignalDispatcher({ retention: 2, logger, metricsCollector: metrics });
  });

  it('シンクごとに前の配信が終わってから次を配る', async () => {
    const sink = new ControlledSink('slow');
    dispatcher.addSink(sink);

    dispatcher.dispatch(signal('a'));
    dispatcher.dispatch(signal('b'));
    await settle();
    expect(sink.started).toEqual(['a']);

    sink.complete(0);
    await settle();
    expect(sink.started).toEqual(['a', 'b']);
  });

  it('遅いシンクは他のシンクへの配信を待たせない', async () => {
    const slow = new ControlledSink('slow');
    const fast = new ImmediateSink();
    dispatcher.addSink(slow);
    dispatcher.addSink(fast);

    dispatcher.dispatch(signal('a'));
    dispatcher.dispatch(signal('b'));
    await settle();

    expect(slow.started).toEqual(['a']);
    expect(fast.delivered).toEqual(['a', 'b']);
  });

  it('配信失敗は記録し、後続の配信は続ける', async () => {
    const sink = new ControlledSink('redis');
    dispatcher.addSink(sink);

    dispatcher.dispatch(signal('a'));
    dispatcher.dispatch(signal('b'));
    await settle();
    sink.fail(0, new DeliveryError('redis', 'connection refused'));
    await settle();

    expect(sink.started).toEqual(['a', 'b']);
    expect(metrics.incrementDeliveryFailure).toHaveBeenCalledWith('redis');
    expect(logger.error).toHaveBeenCalledWith(
      'signal delivery failed',
      expect.objectContaining({ sink: 'redis', signalId: 'a', instrument: 'BTCUSDT' })
    );
  });

  it('flush() は受付済みの配信の完了を待つ', async () => {
    const sink = new ImmediateSink();
    dispatcher.addSink(sink);

    dispatcher.dispatch(signal('a'));
    dispatcher.dispatch(signal('b'));
    await dispatcher.flush();

    expect(sink.delivered).toEqual(['a', 'b']);
  });

  it('銘柄ごとに直近のシグナルを保持数まで残す', () => {
    dispatcher.dispatch(signal('a'));
    dispatcher.dispatch(signal('b'));
    dispatcher.dispatch(signal('c'));
    dispatcher.dispatch(signal('x', 'ETHUSDT'));

    expect(dispatcher.recentSignals('BTCUSDT', 10).map((event) => event.id)).toEqual(['b', 'c']);
    expect(dispatcher.recentSignals('BTCUSDT', 1).map((event) => event.id)).toEqual(['c']);
    expect(dispatcher.recentSignals('ETHUSDT', 10).map((event) => event.id)).toEqual(['x']);
  });

  it('forget() で銘柄の履歴を破棄する', () => {
    dispatcher.dispatch(signal('a'));
    dispatcher.forget('BTCUSDT');

    expect(dispatcher.recentSignals('BTCUSDT', 10)).toEqual([]);
  });
});
