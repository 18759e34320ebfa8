import type { Logger } from '@/application/interfaces/Logger';
import type { MarketEventConsumer } from '@/application/interfaces/MarketEventConsumer';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { MarketEvent } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';

/**
 * アプリケーション層: 市場イベント取り込みユースケース
 *
 * 責務: ストリームから届いたイベントを板エンジン・足集計へ同じ順序で渡す司令塔。
 * 1 つの consumer の失敗が他の consumer への配信を止めないようにする。
 */
export class ProcessMarketEventUsecase implements MarketEventConsumer {
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  constructor(
    private readonly consumers: readonly MarketEventConsumer[],
    options: { logger?: Logger; metricsCollector?: MetricsCollector } = {}
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'ProcessMarketEventUsecase' });
    this.metricsCollector = options.metricsCollector;
  }

  onEvent(event: MarketEvent): void {
    if (event.type !== 'connection') {
      this.metricsCollector?.incrementReceived(event.type, event.instrument);
    }

    for (const consumer of this.consumers) {
      try {
        consumer.onEvent(event);
      } catch (error) {
        this.metricsCollector?.incrementError('consumer_error');
        this.logger.error('failed to process market event', { type: event.type, err: error });
      }
    }
  }
}
