import type { ConnectionState } from '../types/connection.js';
import type { LiveEvent, ServerMessage, WSMessage } from '../types/messages.js';
import { TransportUnavailableError, describeError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { decodeServerMessage, encodeClientMessage } from './decode.js';
import { ScheduledTask, systemScheduler } from './scheduler.js';
import type { Scheduler } from './scheduler.js';
import { wsTransportFactory } from './transport.js';
import type { Transport, TransportFactory, TransportHandlers } from './transport.js';

export interface ConnectionManagerOptions {
  /** Channel URL (e.g., 'wss://learn.example.com/ws/main') */
  url: string;
  /** Transport constructor (default: `ws` package) */
  transportFactory?: TransportFactory;
  /** Timer source (default: global timers) */
  scheduler?: Scheduler;
  logger?: Logger;
  /** Ping cadence while connected in ms (default: 30000) */
  heartbeatIntervalMs?: number;
  /** Delay before the first reconnect attempt in ms (default: 5000) */
  reconnectDelayMs?: number;
  /** Growth factor per consecutive failed attempt (default: 1, a fixed delay) */
  backoffMultiplier?: number;
  /** Ceiling for the grown delay in ms (default: 30000) */
  maxReconnectDelayMs?: number;
  /** Max consecutive reconnect attempts (default: 0 = unlimited) */
  maxReconnectAttempts?: number;
  /** Max outbound messages held while disconnected (default: 10) */
  maxQueueSize?: number;
  /** Receives notification and update messages */
  onMessage?: (event: LiveEvent) => void;
  onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
}

function assertNever(value: never): never {
  throw new Error(`unhandled message variant: ${JSON.stringify(value)}`);
}

/**
 * Owns the single live connection to the server's push channel.
 *
 * Sends a ping on open and then every heartbeat interval, decodes inbound
 * frames once at the boundary and forwards UI-relevant ones to `onMessage`,
 * and reconnects after every close until `stop()` is called. Transport
 * failures are logged, never thrown.
 */
export class ConnectionManager {
  private transport: Transport | null = null;
  private currentState: ConnectionState = 'disconnected';
  private stopped = false;
  private attempts = 0;
  /** Bumped per transport so late events from a replaced socket are ignored */
  private generation = 0;
  private queue: string[] = [];

  private readonly heartbeat: ScheduledTask;
  private readonly reconnect: ScheduledTask;

  private readonly url: string;
  private readonly transportFactory: TransportFactory;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly heartbeatIntervalMs: number;
  private readonly reconnectDelayMs: number;
  private readonly backoffMultiplier: number;
  private readonly maxReconnectDelayMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly maxQueueSize: number;
  private readonly onMessage?: (event: LiveEvent) => void;
  private readonly onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;

  constructor(options: ConnectionManagerOptions) {
    this.url = options.url;
    this.transportFactory = options.transportFactory ?? wsTransportFactory;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.logger = options.logger ?? createLogger('live-connection');
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30_000;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 5_000;
    this.backoffMultiplier = options.backoffMultiplier ?? 1;
    this.maxReconnectDelayMs = options.maxReconnectDelayMs ?? 30_000;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 0;
    this.maxQueueSize = options.maxQueueSize ?? 10;
    this.onMessage = options.onMessage;
    this.onStateChange = options.onStateChange;

    this.heartbeat = new ScheduledTask(this.scheduler);
    this.reconnect = new ScheduledTask(this.scheduler);
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get connected(): boolean {
    return this.currentState === 'connected';
  }

  /** Whether a reconnect attempt is waiting on its delay. */
  get reconnectPending(): boolean {
    return this.reconnect.pending;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Open a connection unless one is already open or being opened.
   * Also re-enables a stopped manager.
   */
  start(): void {
    if (this.currentState !== 'disconnected') return;

    this.stopped = false;
    this.reconnect.cancel();
    this.setState('connecting');

    const generation = ++this.generation;
    try {
      this.transport = this.transportFactory(this.url, this.handlersFor(generation));
    } catch (err) {
      // No retry from here: only a close event or an explicit start() retries
      const error = new TransportUnavailableError(this.url, err);
      this.logger.error(error.message);
      this.transport = null;
      this.setState('disconnected');
    }
  }

  /** Close the connection and cancel every pending timer. */
  stop(): void {
    this.stopped = true;
    this.generation++;
    this.reconnect.cancel();
    this.heartbeat.cancel();
    this.queue = [];

    const transport = this.transport;
    this.transport = null;
    this.setState('disconnected');

    if (transport) {
      try {
        transport.close(1000, 'client stopped');
      } catch (err) {
        this.logger.warn(`error while closing transport: ${describeError(err)}`);
      }
    }
  }

  /** Send an application message, queuing it while disconnected. Returns true if sent now. */
  send(message: WSMessage): boolean {
    const data = JSON.stringify(message);
    if (this.connected && this.transmit(data)) {
      return true;
    }
    if (this.queue.length >= this.maxQueueSize) {
      this.queue.shift();
    }
    this.queue.push(data);
    return false;
  }

  /**
   * Send one ping if connected, then schedule the next one.
   * The chain lives in a single cancellable task, stopped on close.
   */
  sendHeartbeat(): void {
    if (!this.connected) return;
    this.transmit(encodeClientMessage({ type: 'ping', timestamp: this.scheduler.now() }));
    this.heartbeat.schedule(() => this.sendHeartbeat(), this.heartbeatIntervalMs);
  }

  private handlersFor(generation: number): TransportHandlers {
    const current = () => generation === this.generation;
    return {
      onOpen: () => { if (current()) this.handleOpen(); },
      onMessage: (data) => { if (current()) this.handleMessage(data); },
      onClose: (code, reason) => { if (current()) this.handleClose(code, reason); },
      onError: (error) => { if (current()) this.handleError(error); },
    };
  }

  private handleOpen(): void {
    this.attempts = 0;
    this.setState('connected');
    this.logger.info(`connected to ${this.url}`);
    this.flushQueue();
    this.heartbeat.cancel();
    this.sendHeartbeat();
  }

  private handleMessage(raw: string): void {
    const result = decodeServerMessage(raw);
    if (!result.ok) {
      this.logger.error(`dropping malformed message: ${result.error.message}`, result.error.raw);
      return;
    }
    this.dispatch(result.message);
  }

  private dispatch(message: ServerMessage): void {
    switch (message.type) {
      case 'pong':
        this.logger.info('received pong from server');
        return;
      case 'notification':
      case 'update':
        this.deliver(message);
        return;
      case 'unknown':
        this.logger.info(`ignoring message of unknown type "${message.rawType}"`);
        return;
      default:
        assertNever(message);
    }
  }

  private deliver(event: LiveEvent): void {
    if (!this.onMessage) return;
    try {
      this.onMessage(event);
    } catch (err) {
      this.logger.error(`${event.type} handler failed: ${describeError(err)}`);
    }
  }

  private handleClose(code: number, reason: string): void {
    this.transport = null;
    this.heartbeat.cancel();
    this.setState('disconnected');
    this.logger.info(`disconnected (code ${code}${reason ? `, ${reason}` : ''})`);
    if (!this.stopped) {
      this.scheduleReconnect();
    }
  }

  private handleError(error: Error): void {
    // The transport follows an error with a close; reconnection happens there
    this.logger.error(`transport error: ${error.message}`);
  }

  private scheduleReconnect(): void {
    if (this.reconnect.pending) return;
    if (this.maxReconnectAttempts > 0 && this.attempts >= this.maxReconnectAttempts) {
      this.logger.warn(`giving up after ${this.attempts} reconnect attempts`);
      return;
    }

    const delay = this.nextReconnectDelay();
    this.attempts++;
    this.logger.info(`reconnecting in ${delay}ms (attempt ${this.attempts})`);
    this.reconnect.schedule(() => this.start(), delay);
  }

  private nextReconnectDelay(): number {
    const grown = this.reconnectDelayMs * Math.pow(this.backoffMultiplier, this.attempts);
    const ceiling = Math.max(this.maxReconnectDelayMs, this.reconnectDelayMs);
    return Math.min(grown, ceiling);
  }

  private transmit(data: string): boolean {
    const transport = this.transport;
    if (!transport || !transport.isOpen) return false;
    try {
      transport.send(data);
      return true;
    } catch (err) {
      this.logger.error(`send failed: ${describeError(err)}`);
      return false;
    }
  }

  private flushQueue(): void {
    while (this.queue.length > 0 && this.connected) {
      const data = this.queue[0];
      if (!this.transmit(data)) return;
      this.queue.shift();
    }
  }

  private setState(next: ConnectionState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    if (!this.onStateChange) return;
    try {
      this.onStateChange(next, previous);
    } catch (err) {
      this.logger.error(`state listener failed: ${describeError(err)}`);
    }
  }
}
