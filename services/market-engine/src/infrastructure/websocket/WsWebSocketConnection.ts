import type WebSocket from 'ws';
import type { WebSocketConnection, WebSocketData } from './WebSocketConnection';

/**
 * ws パッケージの WebSocket を使った接続の実装
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: WebSocketData) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];
  private pingCallbacks: Array<() => void> = [];

  constructor(private readonly socket: WebSocket) {
    // ws のイベントを内部で管理
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data, isBinary) => {
      // テキストフレームは文字列にして渡す
      const payload: WebSocketData = isBinary ? data : data.toString();
      for (const cb of this.messageCallbacks) {
        cb(payload);
      }
    });

    this.socket.on('close', (code, reason) => {
      for (const cb of this.closeCallbacks) {
        cb(code, reason.toString());
      }
    });

    this.socket.on('error', (error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });

    // pong は ws が自動で返す（autoPong）
    this.socket.on('ping', () => {
      for (const cb of this.pingCallbacks) {
        cb();
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: WebSocketData) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  onPing(callback: () => void): void {
    this.pingCallbacks.push(callback);
  }

  send(data: string): void {
    this.socket.send(data);
  }

  close(): void {
    this.socket.close();
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
    this.pingCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}
