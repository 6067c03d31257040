import WebSocket from 'ws';
import type { RawData } from 'ws';

export interface TransportHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

/** The half of a socket the connection manager needs. */
export interface Transport {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * Opens a transport to `url` and reports its lifecycle through `handlers`.
 * May throw synchronously when the connection cannot even be attempted.
 */
export type TransportFactory = (url: string, handlers: TransportHandlers) => Transport;

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/** Transport backed by the `ws` package. */
export const wsTransportFactory: TransportFactory = (url, handlers) => {
  const socket = new WebSocket(url);

  socket.on('open', () => handlers.onOpen());
  socket.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  socket.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  // 'close' always follows 'error', so reconnection is left to the close handler
  socket.on('error', (err) => handlers.onError(err));

  return {
    get isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    send(data) {
      socket.send(data);
    },
    close(code, reason) {
      // During the handshake this aborts with an 'error' event, which the
      // listener above absorbs
      socket.close(code, reason);
    },
  };
};
