import type { Transport, TransportFactory, TransportHandlers } from '../../src/ws/transport.ts';

export class FakeSocket implements Transport {
  isOpen = false;
  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;

  constructor(readonly url: string, private readonly handlers: TransportHandlers) {}

  open(): void {
    this.isOpen = true;
    this.handlers.onOpen();
  }

  receive(data: string): void {
    this.handlers.onMessage(data);
  }

  /** Simulate the server or network dropping the connection. */
  drop(code = 1006, reason = ''): void {
    this.isOpen = false;
    this.handlers.onClose(code, reason);
  }

  fail(error: Error): void {
    this.handlers.onError(error);
  }

  send(data: string): void {
    if (!this.isOpen) throw new Error('socket is not open');
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.isOpen = false;
    this.closedWith = { code, reason };
  }

  /** Sent frames decoded, filtered to pings. */
  pings(): unknown[] {
    return this.sent
      .map((frame): unknown => JSON.parse(frame))
      .filter((msg) => typeof msg === 'object' && msg !== null && 'type' in msg && msg.type === 'ping');
  }
}

/** Hands out FakeSockets and remembers every one it created. */
export class FakeNetwork {
  readonly sockets: FakeSocket[] = [];
  /** When set, the factory throws instead of creating a socket */
  refuse: Error | null = null;

  readonly factory: TransportFactory = (url, handlers) => {
    if (this.refuse) throw this.refuse;
    const socket = new FakeSocket(url, handlers);
    this.sockets.push(socket);
    return socket;
  };

  get latest(): FakeSocket {
    const socket = this.sockets.at(-1);
    if (!socket) throw new Error('no socket has been created');
    return socket;
  }
}
