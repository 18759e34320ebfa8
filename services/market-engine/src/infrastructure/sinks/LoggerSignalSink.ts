import type { Logger } from '@/application/interfaces/Logger';
import type { SignalSink } from '@/application/interfaces/SignalSink';
import type { SignalEvent } from '@/domain/types';

/**
 * シグナルを構造化ログとして出力するシンク。Redis を使わない構成での既定の配信先。
 */
export class LoggerSignalSink implements SignalSink {
  readonly name = 'log';

  constructor(private readonly logger: Logger) {}

  async deliver(event: SignalEvent): Promise<void> {
    const meta = {
      signalId: event.id,
      instrument: event.instrument,
      ruleId: event.ruleId,
      kind: event.kind,
      ts: event.timestamp,
      payload: event.payload,
    };
    if (event.severity === 'critical') {
      this.logger.warn('signal', { severity: event.severity, ...meta });
    } else {
      this.logger.info('signal', { severity: event.severity, ...meta });
    }
  }
}
