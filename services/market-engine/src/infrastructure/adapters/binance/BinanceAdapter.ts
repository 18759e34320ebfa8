import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataAdapter } from '@/application/interfaces/MarketDataAdapter';
import type { Instrument } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';
import type { WebSocketConnection } from '@/infrastructure/websocket/WebSocketConnection';
import { BinanceWebSocketClient, type ConnectionFactory } from './BinanceWebSocketClient';

/**
 * BinanceAdapter の初期化オプション
 */
interface BinanceAdapterOptions {
  logger?: Logger;
  connectionFactory?: ConnectionFactory;
}

/**
 * インフラ層: MarketDataAdapter 実装
 *
 * 責務: Binance 固有の WebSocket プロトコル実装（接続、購読、フレームの復号）
 */
export class BinanceAdapter implements MarketDataAdapter {
  private connection: WebSocketConnection | null = null;
  private readonly webSocketClient: BinanceWebSocketClient;
  private readonly logger: Logger;

  private onMessageCallback?: (text: string) => void;
  private onCloseCallback?: (code: number, reason: string) => void;
  private onErrorCallback?: (error: Error) => void;
  private onHeartbeatCallback?: () => void;

  /**
   * @param wsUrl combined stream のエンドポイント URL（例: wss://stream.binance.com:9443/stream）
   */
  constructor(
    private readonly wsUrl: string,
    options?: BinanceAdapterOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'BinanceAdapter' });
    this.webSocketClient = new BinanceWebSocketClient(this.logger, options?.connectionFactory);
  }

  setOnMessage(callback: (text: string) => void): void {
    this.onMessageCallback = callback;
  }

  setOnClose(callback: (code: number, reason: string) => void): void {
    this.onCloseCallback = callback;
  }

  setOnError(callback: (error: Error) => void): void {
    this.onErrorCallback = callback;
  }

  setOnHeartbeat(callback: () => void): void {
    this.onHeartbeatCallback = callback;
  }

  /**
   * WebSocket 接続を確立する。
   * 既存の接続がある場合はクリーンアップしてから新規接続を試みる。
   * 接続成功時は購読コマンドを送信する。
   */
  async connect(instruments: readonly Instrument[]): Promise<void> {
    this.release();

    const connection = await this.webSocketClient.connect(this.wsUrl);
    this.connection = connection;

    // 購読前にハンドラを設定する
    connection.onMessage((data) => {
      this.onMessageCallback?.(this.webSocketClient.decode(data));
    });

    connection.onPing(() => {
      this.onHeartbeatCallback?.();
    });

    connection.onClose((code, reason) => {
      if (this.connection === connection) {
        this.connection = null;
      }
      this.logger.warn('socket closed', { code, reason });
      this.onCloseCallback?.(code, reason);
    });

    connection.onError((error) => {
      this.logger.error('socket error', { err: error });
      this.onErrorCallback?.(error);
    });

    if (instruments.length > 0) {
      this.webSocketClient.subscribe(connection, instruments);
    }
  }

  subscribe(instruments: readonly Instrument[]): void {
    if (this.connection && instruments.length > 0) {
      this.webSocketClient.subscribe(this.connection, instruments);
    }
  }

  unsubscribe(instruments: readonly Instrument[]): void {
    if (this.connection && instruments.length > 0) {
      this.webSocketClient.unsubscribe(this.connection, instruments);
    }
  }

  disconnect(): void {
    if (this.connection) {
      this.connection.removeAllListeners();
      this.connection.close();
      this.connection = null;
    }
  }

  terminate(): void {
    this.connection?.terminate();
  }

  private release(): void {
    if (this.connection) {
      this.connection.removeAllListeners();
      this.connection.terminate();
      this.connection = null;
    }
  }
}
