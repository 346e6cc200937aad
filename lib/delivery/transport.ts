/**
 * What a connection session needs from its socket.
 *
 * The gateway wraps each `ws` socket with createWsTransport; tests drive
 * sessions through an in-memory implementation of the same interface.
 */

import { WebSocket, type RawData } from 'ws';
import { incrementCounter } from './metrics';

export interface SessionTransport {
  readonly isOpen: boolean;
  /** Resolves once the frame is handed to the socket; rejects on a send failure. */
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
  onMessage(handler: (text: string) => void): void;
  onClose(handler: (code: number, reason: string) => void): void;
  onError(handler: (error: Error) => void): void;
}

export function createWsTransport(ws: WebSocket): SessionTransport {
  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send(data) {
      if (ws.readyState !== WebSocket.OPEN) {
        return Promise.reject(new Error(`WebSocket is not open (readyState ${ws.readyState})`));
      }
      return new Promise<void>((resolve, reject) => {
        ws.send(data, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },
    close(code, reason) {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, reason);
      }
    },
    onMessage(handler) {
      ws.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) {
          incrementCounter('delivery.frames.binary_ignored');
          return;
        }
        handler(data.toString());
      });
    },
    onClose(handler) {
      ws.on('close', (code: number, reason: Buffer) => {
        handler(code, reason.toString());
      });
    },
    onError(handler) {
      ws.on('error', handler);
    },
  };
}
