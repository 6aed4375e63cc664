import type { RawData, WebSocket } from 'ws';

/**
 * Text-frame transport between the browser and a session bridge.
 */
export interface Transport {
  send(payload: string, callback?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  onMessage(listener: (payload: string) => void): void;
  onClose(listener: () => void): void;
  isOpen(): boolean;
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function wrapWebSocket(socket: WebSocket): Transport {
  return {
    send(payload, callback) {
      if (socket.readyState !== socket.OPEN) {
        callback?.(new Error('WebSocket is not open'));
        return;
      }
      socket.send(payload, callback);
    },
    close(code = 1000, reason) {
      if (socket.readyState === socket.CLOSING || socket.readyState === socket.CLOSED) return;
      socket.close(code, reason);
    },
    onMessage(listener) {
      socket.on('message', (data) => listener(rawToString(data)));
    },
    onClose(listener) {
      socket.once('close', () => listener());
    },
    isOpen() {
      return socket.readyState === socket.OPEN;
    },
  };
}
