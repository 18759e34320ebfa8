import type { MarketEvent } from '@/domain/types';

/**
 * Stream Client から配信されるイベントの受け手。
 * 呼び出しは到着順・同期的に行われるため、実装側でブロックしてはならない。
 */
export interface MarketEventConsumer {
  onEvent(event: MarketEvent): void;
}
