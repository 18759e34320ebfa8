import WebSocket from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import type { Instrument } from '@/domain/types';
import { LoggerFactory } from '@/infrastructure/logger/LoggerFactory';
import type { WebSocketConnection, WebSocketData } from '@/infrastructure/websocket/WebSocketConnection';
import { WsWebSocketConnection } from '@/infrastructure/websocket/WsWebSocketConnection';
import type { BinanceCommand } from './messages/BinanceRawMessage';

/**
 * URL から未接続の WebSocketConnection を作る関数。テストでは偽の接続を返す。
 */
export type ConnectionFactory = (url: string) => WebSocketConnection;

const defaultConnectionFactory: ConnectionFactory = (url) => new WsWebSocketConnection(new WebSocket(url));

/**
 * 銘柄から購読するストリーム名を作る（差分板 100ms と約定）
 */
export function streamNames(instrument: Instrument): string[] {
  const symbol = instrument.toLowerCase();
  return [`${symbol}@depth@100ms`, `${symbol}@trade`];
}

/**
 * インフラ層: Binance WebSocket 接続・購読・受信（低レベル）
 *
 * 責務: Binance API の WebSocket プロトコル実装。
 * WebSocket 接続の確立、購読コマンド送信、受信フレームの復号のみを担当する。
 */
export class BinanceWebSocketClient {
  private nextCommandId = 1;
  private readonly logger: Logger;

  constructor(
    logger?: Logger,
    private readonly connectionFactory: ConnectionFactory = defaultConnectionFactory
  ) {
    this.logger = logger ?? LoggerFactory.create();
  }

  /**
   * WebSocket 接続を確立する。
   * @param wsUrl WebSocket エンドポイント URL
   * @returns 接続が確立されたら解決される
   */
  async connect(wsUrl: string): Promise<WebSocketConnection> {
    return new Promise<WebSocketConnection>((resolve, reject) => {
      const connection = this.connectionFactory(wsUrl);
      let settled = false;

      connection.onOpen(() => {
        settled = true;
        resolve(connection);
      });

      // 接続確立前のエラーのみ扱う。確立後のエラーは呼び出し側のハンドラに任せる
      connection.onError((error) => {
        if (settled) {
          return;
        }
        settled = true;
        connection.removeAllListeners();
        connection.terminate();
        reject(new Error(`WebSocket connection failed: ${error.message}`, { cause: error }));
      });
    });
  }

  /**
   * 購読コマンドを送信する。
   * @returns 送信したコマンドの id
   */
  subscribe(connection: WebSocketConnection, instruments: readonly Instrument[]): number {
    return this.send(connection, 'SUBSCRIBE', instruments);
  }

  unsubscribe(connection: WebSocketConnection, instruments: readonly Instrument[]): number {
    return this.send(connection, 'UNSUBSCRIBE', instruments);
  }

  /**
   * 受信データをテキストに復号する。
   */
  decode(data: WebSocketData): string {
    if (typeof data === 'string') {
      return data;
    }
    if (Array.isArray(data)) {
      return Buffer.concat(data).toString('utf-8');
    }
    if (data instanceof ArrayBuffer) {
      return Buffer.from(data).toString('utf-8');
    }
    return data.toString('utf-8');
  }

  private send(connection: WebSocketConnection, method: BinanceCommand['method'], instruments: readonly Instrument[]): number {
    const command: BinanceCommand = {
      method,
      params: instruments.flatMap(streamNames),
      id: this.nextCommandId++,
    };
    connection.send(JSON.stringify(command));
    this.logger.debug('command sent', { method, params: command.params, id: command.id });
    return command.id;
  }
}
