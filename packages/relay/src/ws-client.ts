// WebSocket Client - OneBot v11 reverse WebSocket transport
//
// Holds the single outbound connection to the bot endpoint. Events written
// while disconnected wait in a bounded buffer; inbound action frames are
// handed to the dispatcher. Reconnects with exponential backoff and drops the
// socket when the endpoint goes silent.

import WebSocket from 'ws';
import { Backoff } from './backoff.js';
import type { EndpointConfig } from './config.js';
import {
  MappingError,
  OverloadError,
  RelayError,
  TransientIOError,
  describeError,
} from './errors.js';
import type { Logger } from './log.js';
import { silentLogger } from './log.js';
import { buildHeartbeat, buildLifecycle, parseInboundFrame } from './protocol.js';
import { BoundedQueue } from './queue.js';
import type {
  ActionResponse,
  ConnectionStateName,
  OutboundFrame,
  ProtocolAction,
  ProtocolEvent,
} from './types.js';

export type ConnectionState =
  | { name: 'disconnected'; since: number; reason?: string }
  | { name: 'connecting'; since: number; attempt: number }
  | { name: 'connected'; since: number }
  | { name: 'closing'; since: number };

const TRANSITIONS: Record<ConnectionStateName, readonly ConnectionStateName[]> = {
  disconnected: ['connecting'],
  connecting: ['connected', 'disconnected', 'closing'],
  connected: ['disconnected', 'closing'],
  closing: ['disconnected'],
};

export function canTransition(from: ConnectionStateName, to: ConnectionStateName): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface SocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  /** Pong or ping from the endpoint; counts as inbound traffic. */
  onPong(): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface TransportSocket {
  /** False once the socket has started closing; writes would be lost. */
  isOpen(): boolean;
  send(data: string): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export type SocketFactory = (
  url: string,
  headers: Record<string, string>,
  handlers: SocketHandlers,
) => TransportSocket;

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

export const openWebSocket: SocketFactory = (url, headers, handlers) => {
  const ws = new WebSocket(url, { headers, handshakeTimeout: 10_000 });

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  ws.on('pong', () => handlers.onPong());
  ws.on('ping', () => handlers.onPong());
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString()));
  ws.on('error', (err) => handlers.onError(err));

  return {
    isOpen: () => ws.readyState === WebSocket.OPEN,
    send: (data) => {
      ws.send(data, (err) => {
        if (err) handlers.onError(err);
      });
    },
    ping: () => ws.ping(),
    close: (code, reason) => ws.close(code, reason),
    terminate: () => ws.terminate(),
  };
};

export interface WsClientOptions {
  endpoint: EndpointConfig;
  selfId: string;
  bufferCapacity: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  reconnect: {
    initialDelayMs: number;
    maxDelayMs: number;
    stabilityWindowMs: number;
  };
  onAction: (action: ProtocolAction) => void;
  onError?: (error: RelayError) => void;
  onStateChange?: (state: ConnectionState) => void;
  socketFactory?: SocketFactory;
  logger?: Logger;
  now?: () => number;
}

const STOP_GRACE_MS = 1_000;

export class WsClient {
  private options: WsClientOptions;
  private endpoint: EndpointConfig;
  private logger: Logger;
  private now: () => number;
  private socketFactory: SocketFactory;
  private backoff: Backoff;
  private outbound: BoundedQueue<ProtocolEvent>;

  private current: ConnectionState;
  private socket: TransportSocket | null = null;
  private generation = 0;
  private attempt = 0;
  private stopped = true;
  private lastInboundAt = 0;
  private closeWaiter: (() => void) | null = null;
  private stopping: Promise<void> | null = null;

  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private stabilityTimer: NodeJS.Timeout | null = null;

  constructor(options: WsClientOptions) {
    this.options = options;
    this.endpoint = options.endpoint;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.socketFactory = options.socketFactory ?? openWebSocket;
    this.backoff = new Backoff({
      initialDelayMs: options.reconnect.initialDelayMs,
      maxDelayMs: options.reconnect.maxDelayMs,
    });
    this.outbound = new BoundedQueue<ProtocolEvent>(options.bufferCapacity);
    this.current = { name: 'disconnected', since: this.now() };
  }

  get state(): ConnectionState {
    return this.current;
  }

  get connected(): boolean {
    return this.current.name === 'connected' && this.socket !== null;
  }

  get running(): boolean {
    return !this.stopped;
  }

  get url(): string {
    return this.endpoint.url;
  }

  get buffered(): number {
    return this.outbound.size;
  }

  get bufferOverflows(): number {
    return this.outbound.overflows;
  }

  /** Delay the next reconnect would wait. */
  get nextReconnectDelay(): number {
    return this.backoff.current;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.backoff.reset();
    this.connect();
  }

  /**
   * Closes the connection and stops reconnecting. Waits briefly for the close
   * handshake, then terminates the socket.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.stopped && !this.socket) return Promise.resolve();
    this.stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.stopped = true;
    this.clearReconnectTimer();
    this.clearConnectionTimers();

    const socket = this.socket;
    if (!socket) {
      if (this.current.name !== 'disconnected') {
        this.transition({ name: 'disconnected', since: this.now(), reason: 'stopped' });
      }
      return;
    }

    this.transition({ name: 'closing', since: this.now() });
    const closingGeneration = this.generation;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn('[ws-client] Close handshake timed out, terminating socket');
        socket.terminate();
        resolve();
      }, STOP_GRACE_MS);
      const finish = () => {
        clearTimeout(timer);
        resolve();
      };
      this.closeWaiter = finish;
      try {
        socket.close(1000, 'relay stopping');
      } catch (err) {
        this.logger.warn(`[ws-client] Close failed: ${describeError(err)}`);
        socket.terminate();
        finish();
      }
    });

    this.closeWaiter = null;
    if (this.generation === closingGeneration) this.generation++;
    this.socket = null;
    this.transition({ name: 'disconnected', since: this.now(), reason: 'stopped' });
    this.logger.info('[ws-client] Stopped');
  }

  /**
   * Sends an event now, or buffers it until the connection is back. A full
   * buffer evicts its oldest event.
   */
  send(event: ProtocolEvent): 'sent' | 'buffered' {
    if (this.connected && this.outbound.size === 0 && this.write(event.frame)) {
      return 'sent';
    }
    this.buffer(event);
    return 'buffered';
  }

  /** Action responses are only meaningful on the live connection; never buffered. */
  sendResponse(response: ActionResponse): boolean {
    if (!this.connected) {
      this.logger.debug(`[ws-client] Dropping response for echo ${JSON.stringify(response.echo)}: not connected`);
      return false;
    }
    return this.write(response);
  }

  /** Points the client at a new endpoint; a running client reconnects right away. */
  reconfigure(endpoint: EndpointConfig): void {
    const changed = endpoint.url !== this.endpoint.url || endpoint.accessToken !== this.endpoint.accessToken;
    this.endpoint = endpoint;
    if (!changed || this.stopped) return;

    this.logger.info(`[ws-client] Endpoint changed to ${endpoint.url}, reconnecting`);
    this.clearReconnectTimer();
    this.dropConnection('endpoint changed', { terminate: false, reconnect: false });
    this.backoff.reset();
    this.connect();
  }

  private connect(): void {
    if (this.stopped) return;

    this.attempt++;
    this.transition({ name: 'connecting', since: this.now(), attempt: this.attempt });
    this.logger.info(`[ws-client] Connecting to ${this.endpoint.url} (attempt ${this.attempt})`);

    const headers: Record<string, string> = {
      'X-Self-ID': this.options.selfId,
      'X-Client-Role': 'Universal',
    };
    if (this.endpoint.accessToken) {
      headers.Authorization = `Bearer ${this.endpoint.accessToken}`;
    }

    const generation = ++this.generation;
    try {
      this.socket = this.socketFactory(this.endpoint.url, headers, this.handlersFor(generation));
    } catch (err) {
      this.logger.error(`[ws-client] Cannot open connection: ${describeError(err)}`);
      this.report(new TransientIOError(`Cannot open connection to ${this.endpoint.url}: ${describeError(err)}`, err));
      this.dropConnection('connect failed', { terminate: false, reconnect: true });
    }
  }

  private handlersFor(generation: number): SocketHandlers {
    const live = () => generation === this.generation;
    return {
      onOpen: () => {
        if (live()) this.handleOpen();
      },
      onMessage: (text) => {
        if (live()) this.handleMessage(text);
      },
      onPong: () => {
        if (live()) this.lastInboundAt = this.now();
      },
      onClose: (code, reason) => {
        if (!live()) return;
        if (this.current.name === 'closing') {
          this.closeWaiter?.();
          return;
        }
        this.logger.warn(`[ws-client] Connection closed: ${code} ${reason}`);
        this.dropConnection(`closed (${code})`, { terminate: false, reconnect: true });
      },
      onError: (err) => {
        if (!live()) return;
        this.logger.error(`[ws-client] Connection error: ${err.message}`);
        this.report(new TransientIOError(`Connection error: ${err.message}`, err));
      },
    };
  }

  private handleOpen(): void {
    this.attempt = 0;
    this.lastInboundAt = this.now();
    this.transition({ name: 'connected', since: this.now() });
    this.logger.info(`[ws-client] Connected to ${this.endpoint.url}`);

    const selfId = Number(this.options.selfId);
    if (!this.write(buildLifecycle(selfId, 'connect', this.now()))) return;
    this.flush();
    this.startHeartbeat();

    this.stabilityTimer = setTimeout(() => {
      this.stabilityTimer = null;
      this.backoff.reset();
      this.logger.debug('[ws-client] Connection stable, backoff reset');
    }, this.options.reconnect.stabilityWindowMs);
  }

  private handleMessage(text: string): void {
    this.lastInboundAt = this.now();
    try {
      const frame = parseInboundFrame(text, this.now());
      if (frame.type === 'action') {
        this.logger.debug(`[ws-client] Received action ${frame.action.action}`);
        this.options.onAction(frame.action);
      } else {
        this.logger.debug(`[ws-client] Ignoring inbound ${frame.reason}`);
      }
    } catch (err) {
      const error = err instanceof MappingError ? err : new MappingError(describeError(err), err);
      this.logger.warn(`[ws-client] Discarding inbound frame: ${error.message}`);
      this.report(error);
    }
  }

  private startHeartbeat(): void {
    const { heartbeatIntervalMs, heartbeatTimeoutMs } = this.options;
    const selfId = Number(this.options.selfId);

    this.heartbeatTimer = setInterval(() => {
      const silentFor = this.now() - this.lastInboundAt;
      if (silentFor > heartbeatTimeoutMs) {
        this.logger.warn(`[ws-client] No inbound traffic for ${silentFor}ms, dropping connection`);
        this.report(new TransientIOError(`Heartbeat timeout after ${silentFor}ms`));
        this.dropConnection('heartbeat timeout', { terminate: true, reconnect: true });
        return;
      }
      if (!this.write(buildHeartbeat(selfId, heartbeatIntervalMs, this.now()))) return;
      try {
        this.socket?.ping();
      } catch (err) {
        this.logger.warn(`[ws-client] Ping failed: ${describeError(err)}`);
      }
    }, heartbeatIntervalMs);
  }

  private buffer(event: ProtocolEvent): void {
    const evicted = this.outbound.push(event);
    if (evicted) {
      const error = new OverloadError(
        `Outbound buffer full (${this.outbound.capacity}), dropped event ${evicted.eventId}`,
        { eventId: evicted.eventId },
      );
      this.logger.warn(`[ws-client] ${error.message}`);
      this.report(error);
    }
  }

  private flush(): void {
    let sent = 0;
    while (this.connected && this.outbound.size > 0) {
      const event = this.outbound.peek();
      if (!event || !this.write(event.frame)) break;
      this.outbound.shift();
      sent++;
    }
    if (sent > 0) this.logger.info(`[ws-client] Flushed ${sent} buffered event(s)`);
  }

  /**
   * Serializes and writes one frame. A failed write, or a socket that is
   * already closing, drops the connection.
   */
  private write(frame: OutboundFrame): boolean {
    const socket = this.socket;
    if (!socket) return false;
    if (!socket.isOpen()) {
      this.logger.warn('[ws-client] Socket is closing, dropping connection');
      this.dropConnection('socket closing', { terminate: true, reconnect: true });
      return false;
    }
    try {
      socket.send(JSON.stringify(frame));
      return true;
    } catch (err) {
      this.logger.error(`[ws-client] Write failed: ${describeError(err)}`);
      this.report(new TransientIOError(`Write failed: ${describeError(err)}`, err));
      this.dropConnection('write failed', { terminate: true, reconnect: true });
      return false;
    }
  }

  private dropConnection(reason: string, opts: { terminate: boolean; reconnect: boolean }): void {
    const socket = this.socket;
    this.socket = null;
    this.generation++;
    this.clearConnectionTimers();

    if (socket) {
      try {
        if (opts.terminate) socket.terminate();
        else socket.close(1000, reason);
      } catch (err) {
        this.logger.debug(`[ws-client] Ignoring error while discarding socket: ${describeError(err)}`);
      }
    }

    if (this.current.name !== 'disconnected') {
      this.transition({ name: 'disconnected', since: this.now(), reason });
    }
    if (opts.reconnect) this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return;

    const delay = this.backoff.next();
    this.logger.info(`[ws-client] Reconnecting in ${delay / 1000}s...`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private transition(next: ConnectionState): void {
    const from = this.current.name;
    if (!canTransition(from, next.name)) {
      this.logger.warn(`[ws-client] Ignoring illegal transition ${from} -> ${next.name}`);
      return;
    }
    this.current = next;
    this.logger.debug(`[ws-client] ${from} -> ${next.name}`);
    this.options.onStateChange?.(next);
  }

  private report(error: RelayError): void {
    this.options.onError?.(error);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private clearConnectionTimers(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.stabilityTimer) {
      clearTimeout(this.stabilityTimer);
      this.stabilityTimer = null;
    }
  }
}
