import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataAdapter } from '@/application/interfaces/MarketDataAdapter';
import type { MarketEventConsumer } from '@/application/interfaces/MarketEventConsumer';
import type { MessageParser } from '@/application/interfaces/MessageParser';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { StreamSource } from '@/application/interfaces/StreamSource';
import { TransportFault } from '@/domain/errors';
import type { ConnectionEvent, ConnectionState, Instrument, MarketEvent } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';
import type { BackoffStrategy } from '@/infrastructure/reconnect/BackoffStrategy';
import { ReconnectManager } from '@/infrastructure/reconnect/ReconnectManager';

export type ConnectionStateListener = (from: ConnectionState, to: ConnectionState) => void;

export interface StreamClientOptions {
  /** ログ・状態表示に使う名前 */
  name?: string;
  /** この時間なにも受信しなければ接続を切って再接続する。0 で無効 */
  heartbeatTimeoutMs?: number;
  backoff?: BackoffStrategy;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  now?: () => number;
}

/**
 * プレゼンテーション層: ストリーム接続の維持とイベント配信
 *
 * 責務:
 * - 接続状態（disconnected → connecting → connected）の管理と通知
 * - 再接続管理（指数バックオフ + フルジッター）と再購読
 * - フレームを MessageParser で解釈し、到着順のまま同期的に consumer へ渡す
 * - 接続断を dropped、復帰を resumed の ConnectionEvent として 1 回ずつ流す
 *
 * 不正なフレームは数えて捨てるだけで、ストリームは止めない。
 */
export class StreamClient implements StreamSource {
  readonly name: string;
  private readonly instrumentSet = new Set<Instrument>();
  private readonly consumers: MarketEventConsumer[] = [];
  private readonly stateListeners: ConnectionStateListener[] = [];
  private readonly reconnectManager: ReconnectManager;
  private readonly heartbeatTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly now: () => number;
  private _state: ConnectionState = 'disconnected';
  private _malformedCount = 0;
  private stopped = true;
  /** dropped を流したあと、まだ resumed を流していない */
  private dropped = false;
  private watchdog: NodeJS.Timeout | null = null;

  constructor(
    private readonly adapter: MarketDataAdapter,
    private readonly parser: MessageParser,
    instruments: readonly Instrument[],
    options: StreamClientOptions = {}
  ) {
    this.name = options.name ?? 'stream';
    for (const instrument of instruments) {
      this.instrumentSet.add(instrument.toUpperCase());
    }
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs ?? 60_000;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'StreamClient', stream: this.name });
    this.metricsCollector = options.metricsCollector;
    this.now = options.now ?? Date.now;

    // ReconnectManager に再接続時のコールバック（connect メソッド）を渡す
    this.reconnectManager = new ReconnectManager(() => this.connect(), {
      backoff: options.backoff,
      logger: this.logger,
      metricsCollector: this.metricsCollector,
    });

    this.adapter.setOnMessage((text) => this.handleMessage(text));
    this.adapter.setOnClose((code, reason) => this.handleClose(code, reason));
    this.adapter.setOnError((error) => {
      this.metricsCollector?.incrementError('transport_error');
      this.logger.warn('transport error', { err: new TransportFault(error.message, { cause: error }) });
    });
    this.adapter.setOnHeartbeat(() => this.armWatchdog());
  }

  addConsumer(consumer: MarketEventConsumer): void {
    this.consumers.push(consumer);
  }

  onStateChange(listener: ConnectionStateListener): void {
    this.stateListeners.push(listener);
  }

  get state(): ConnectionState {
    return this._state;
  }

  /**
   * 解釈できずに捨てたフレームの数
   */
  get malformedCount(): number {
    return this._malformedCount;
  }

  instruments(): Instrument[] {
    return [...this.instrumentSet];
  }

  /**
   * 接続を開始する。初回接続に失敗しても reject せず、再接続をスケジュールする。
   */
  async start(): Promise<void> {
    this.stopped = false;
    await this.reconnectManager.start();
  }

  /**
   * 接続を切断し、再接続のスケジュールも停止する。dropped は流さない。
   */
  stop(): void {
    this.stopped = true;
    this.reconnectManager.stop();
    this.clearWatchdog();
    this.adapter.disconnect();
    this.transition('disconnected');
  }

  subscribe(instrument: Instrument): void {
    const normalized = instrument.toUpperCase();
    if (this.instrumentSet.has(normalized)) {
      return;
    }
    this.instrumentSet.add(normalized);
    if (this._state === 'connected') {
      this.adapter.subscribe([normalized]);
    }
  }

  /**
   * 購読を解除する。以後この銘柄のイベントは（取引所が送ってきても）配信しない。
   */
  unsubscribe(instrument: Instrument): void {
    const normalized = instrument.toUpperCase();
    if (!this.instrumentSet.delete(normalized)) {
      return;
    }
    if (this._state === 'connected') {
      this.adapter.unsubscribe([normalized]);
    }
  }

  private async connect(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.transition('connecting');
    try {
      await this.adapter.connect(this.instruments());
    } catch (error) {
      this.transition('disconnected');
      throw new TransportFault('connection attempt failed', { cause: error });
    }

    if (this.stopped) {
      this.adapter.disconnect();
      this.transition('disconnected');
      return;
    }

    this.transition('connected');
    this.armWatchdog();
    if (this.dropped) {
      this.dropped = false;
      this.emitConnectionEvent({
        type: 'connection',
        kind: 'resumed',
        instruments: this.instruments(),
        at: this.now(),
      });
    }
  }

  private handleClose(code: number, reason: string): void {
    this.clearWatchdog();
    if (this.stopped) {
      return;
    }
    this.transition('disconnected');
    if (!this.dropped) {
      this.dropped = true;
      this.emitConnectionEvent({
        type: 'connection',
        kind: 'dropped',
        instruments: this.instruments(),
        at: this.now(),
        reason: reason ? `${code} ${reason}` : String(code),
      });
    }
    this.reconnectManager.scheduleReconnect();
  }

  private handleMessage(text: string): void {
    this.armWatchdog();

    const frame = this.parser.parse(text);
    if (frame === null) {
      this._malformedCount += 1;
      this.metricsCollector?.incrementMalformed();
      this.metricsCollector?.incrementError('malformed_message');
      this.logger.warn('malformed frame dropped', {
        err: new TransportFault('malformed frame'),
        preview: text.slice(0, 200),
      });
      return;
    }

    switch (frame.kind) {
      case 'control':
        this.logger.debug('command acknowledged', { id: frame.id });
        return;
      case 'error':
        this.metricsCollector?.incrementError('exchange_error');
        this.logger.error('exchange error frame', { code: frame.code, message: frame.message, id: frame.id });
        return;
      case 'events':
        for (const event of frame.events) {
          if (event.type === 'connection' || this.instrumentSet.has(event.instrument)) {
            this.deliver(event);
          }
        }
        return;
    }
  }

  private emitConnectionEvent(event: ConnectionEvent): void {
    this.logger.info(`connection ${event.kind}`, { reason: event.reason });
    this.deliver(event);
  }

  private deliver(event: MarketEvent): void {
    for (const consumer of this.consumers) {
      try {
        consumer.onEvent(event);
      } catch (error) {
        this.metricsCollector?.incrementError('consumer_error');
        this.logger.error('consumer failed to handle event', { type: event.type, err: error });
      }
    }
  }

  private armWatchdog(): void {
    if (this.heartbeatTimeoutMs <= 0 || this._state !== 'connected') {
      return;
    }
    this.clearWatchdog();
    this.watchdog = setTimeout(() => {
      this.watchdog = null;
      this.metricsCollector?.incrementError('heartbeat_timeout');
      this.logger.warn('no traffic within heartbeat timeout, terminating connection', {
        timeoutMs: this.heartbeatTimeoutMs,
      });
      this.adapter.terminate();
    }, this.heartbeatTimeoutMs);
  }

  private clearWatchdog(): void {
    if (this.watchdog) {
      clearTimeout(this.watchdog);
      this.watchdog = null;
    }
  }

  private transition(to: ConnectionState): void {
    const from = this._state;
    if (from === to) {
      return;
    }
    this._state = to;
    this.logger.debug('connection state changed', { from, to });
    for (const listener of this.stateListeners) {
      listener(from, to);
    }
  }
}
