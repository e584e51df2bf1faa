// Relay - Supervisor wiring the monitor, normalizer, transport and dispatcher

import type { EndpointConfig, RelayConfig } from './config.js';
import { isNumericId, validateConfig } from './config.js';
import { ContactDirectory } from './contacts.js';
import { ReplyDispatcher } from './dispatcher.js';
import {
  FatalConfigError,
  MappingError,
  OverloadError,
  RelayError,
  ValidationError,
  describeError,
} from './errors.js';
import { HealthServer } from './health-server.js';
import type { Logger } from './log.js';
import { silentLogger } from './log.js';
import { MediaStore } from './media.js';
import { ContactMonitor } from './monitor.js';
import { MessageNormalizer } from './normalizer.js';
import { BoundedQueue, waitAtMost } from './queue.js';
import type { ChatSurface } from './surface.js';
import type { LastError, MonitoredContact, ProtocolAction, RawChatMessage, RelayStatus } from './types.js';
import { WsClient, type SocketFactory } from './ws-client.js';

export interface RelayDependencies {
  surface: ChatSurface;
  socketFactory?: SocketFactory;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  now?: () => number;
}

/** Nickname reported to get_login_info. */
const RELAY_NICKNAME = 'deskrelay';

export class Relay {
  private config: RelayConfig;
  private logger: Logger;
  private now: () => number;

  private contacts: ContactDirectory;
  private monitor: ContactMonitor;
  private normalizer: MessageNormalizer;
  private ws: WsClient;
  private dispatcher: ReplyDispatcher;
  private healthServer: HealthServer | null = null;

  private events: BoundedQueue<RawChatMessage>;
  private inbound: BoundedQueue<ProtocolAction>;
  private forwarder: Promise<void> | null = null;

  private active = false;
  private accepting = false;
  private starting: Promise<RelayStatus> | null = null;
  private stopping: Promise<RelayStatus> | null = null;
  private startedAt: number | null = null;
  private lastError: LastError | null = null;
  private droppedEvents = 0;
  private droppedActions = 0;

  constructor(config: RelayConfig, deps: RelayDependencies) {
    this.config = structuredClone(config);
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;

    if (!isNumericId(config.selfId)) {
      throw new FatalConfigError(`selfId must be numeric, got "${config.selfId}"`);
    }
    try {
      this.contacts = new ContactDirectory(config.contacts);
    } catch (err) {
      throw new FatalConfigError(`Invalid monitored contacts: ${describeError(err)}`, err);
    }

    this.events = new BoundedQueue(config.queues.eventCapacity);
    this.inbound = new BoundedQueue(config.queues.inboundCapacity);

    this.monitor = new ContactMonitor({
      surface: deps.surface,
      contacts: this.contacts,
      media: new MediaStore({
        cacheDir: config.media.cacheDir,
        fetchTimeoutMs: config.media.fetchTimeoutMs,
        fetchImpl: deps.fetchImpl,
        logger: this.logger,
      }),
      pollIntervalMs: config.monitor.pollIntervalMs,
      echoWindowMs: config.monitor.echoWindowMs,
      degradedAfterFailures: config.monitor.degradedAfterFailures,
      onMessage: (message) => this.onChatMessage(message),
      onError: (error) => this.record(error),
      logger: this.logger,
      now: this.now,
    });

    this.normalizer = new MessageNormalizer({ selfId: config.selfId });

    this.ws = new WsClient({
      endpoint: { ...config.transport.endpoint },
      selfId: config.selfId,
      bufferCapacity: config.transport.bufferCapacity,
      heartbeatIntervalMs: config.transport.heartbeatIntervalMs,
      heartbeatTimeoutMs: config.transport.heartbeatTimeoutMs,
      reconnect: { ...config.transport.reconnect },
      onAction: (action) => this.onAction(action),
      onError: (error) => this.record(error),
      socketFactory: deps.socketFactory,
      logger: this.logger,
      now: this.now,
    });

    this.dispatcher = new ReplyDispatcher({
      inbound: this.inbound,
      normalizer: this.normalizer,
      contacts: this.contacts,
      sender: this.monitor,
      self: { userId: Number(config.selfId), nickname: RELAY_NICKNAME },
      health: () => ({ online: this.ws.connected, good: !this.monitor.degraded }),
      respond: config.transport.ackActions ? (response) => this.ws.sendResponse(response) : undefined,
      onError: (error) => this.record(error),
      logger: this.logger,
    });

    if (config.healthServer.port !== null) {
      this.healthServer = new HealthServer(config.healthServer.port, () => this.status(), this.logger);
    }
  }

  get running(): boolean {
    return this.active;
  }

  /**
   * Starts every enabled subsystem. Returns the current status when already
   * running; throws FatalConfigError before touching anything when the
   * configuration cannot work.
   */
  start(): Promise<RelayStatus> {
    if (this.starting) return this.starting;
    if (this.active) return Promise.resolve(this.status());
    this.starting = this.startup().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  private async startup(): Promise<RelayStatus> {
    if (this.stopping) await this.stopping;

    validateConfig(this.config);

    if (this.healthServer) {
      try {
        await this.healthServer.start();
      } catch (err) {
        throw new FatalConfigError(`Status server cannot listen on port ${this.config.healthServer.port}: ${describeError(err)}`, err);
      }
    }

    this.active = true;
    this.accepting = true;
    this.startedAt = this.now();
    this.events.reopen();
    this.forwarder = this.forward();
    this.dispatcher.start();
    if (this.config.monitor.enabled) this.monitor.start();
    if (this.config.transport.enabled) this.ws.start();

    const parts = [
      this.config.monitor.enabled ? `monitor (${this.contacts.size} contact(s))` : null,
      this.config.transport.enabled ? `transport (${this.config.transport.endpoint.url})` : null,
    ].filter(Boolean);
    this.logger.info(`[relay] Relay started with ${parts.length > 0 ? parts.join(', ') : 'no subsystems'}`);
    return this.status();
  }

  /**
   * Stops polling and intake, gives queued work `stopGraceMs` to finish,
   * discards the rest and closes the connection. Safe to call repeatedly.
   */
  stop(): Promise<RelayStatus> {
    if (this.stopping) return this.stopping;
    if (!this.active) return Promise.resolve(this.status());
    this.stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  status(): RelayStatus {
    return {
      running: this.active,
      monitor: {
        running: this.monitor.running,
        degraded: this.monitor.degraded,
        consecutiveFailures: this.monitor.consecutiveFailures,
      },
      transport: {
        running: this.ws.running,
        connection: this.ws.state.name,
        endpoint: this.ws.url || null,
        buffered: this.ws.buffered,
        bufferOverflows: this.ws.bufferOverflows,
      },
      contacts: this.contacts.size,
      droppedEvents: this.droppedEvents,
      rejectedActions: this.dispatcher.stats.rejected + this.droppedActions,
      failedSends: this.dispatcher.stats.failed,
      lastError: this.lastError ? { ...this.lastError } : null,
      uptimeMs: this.active && this.startedAt !== null ? this.now() - this.startedAt : 0,
    };
  }

  startMonitor(): void {
    this.requireRunning('startMonitor');
    this.monitor.start();
  }

  async stopMonitor(): Promise<void> {
    await this.monitor.stop();
  }

  startTransport(): void {
    this.requireRunning('startTransport');
    validateConfig({ ...this.config, transport: { ...this.config.transport, enabled: true } });
    this.ws.start();
  }

  async stopTransport(): Promise<void> {
    await this.ws.stop();
  }

  /** Adds a contact, or updates the id of an existing one. Picked up next poll. */
  addContact(contact: MonitoredContact): void {
    this.contacts.add(contact);
    this.logger.info(`[relay] Monitoring ${contact.nickname}`);
  }

  removeContact(nickname: string): boolean {
    const removed = this.contacts.remove(nickname);
    if (removed) this.logger.info(`[relay] No longer monitoring ${nickname}`);
    return removed;
  }

  setContacts(contacts: MonitoredContact[]): void {
    this.contacts.replace(contacts);
    this.logger.info(`[relay] Monitoring ${this.contacts.size} contact(s)`);
  }

  reconfigureEndpoint(endpoint: EndpointConfig): void {
    if (!/^wss?:\/\//.test(endpoint.url)) {
      throw new ValidationError(`Remote endpoint must be a ws:// or wss:// URL, got "${endpoint.url}"`);
    }
    this.config.transport.endpoint = { ...endpoint };
    this.ws.reconfigure({ ...endpoint });
  }

  private async shutdown(): Promise<RelayStatus> {
    this.logger.info('[relay] Shutting down...');
    const grace = this.config.stopGraceMs;

    await this.monitor.stopPolling();
    this.accepting = false;

    const started = this.now();
    await Promise.all([
      waitAtMost(this.events.whenEmpty(), grace),
      this.dispatcher.stop(grace),
    ]);

    this.events.close();
    const discarded = this.events.clear().length;
    if (discarded > 0) {
      this.droppedEvents += discarded;
      this.logger.warn(`[relay] Discarded ${discarded} unforwarded event(s) on stop`);
    }
    await this.forwarder;
    this.forwarder = null;

    await this.ws.stop();
    await this.monitor.stop();
    await this.healthServer?.stop();

    this.active = false;
    this.logger.info(`[relay] Relay stopped (${this.now() - started}ms drain)`);
    return this.status();
  }

  /** Event Queue -> normalizer -> transport. */
  private async forward(): Promise<void> {
    for (;;) {
      const raw = await this.events.take();
      if (!raw) return;
      try {
        const event = this.normalizer.toProtocolEvent(raw);
        const outcome = this.ws.send(event);
        this.logger.debug(`[relay] Event ${event.eventId} from ${raw.contact.nickname} ${outcome}`);
      } catch (err) {
        const error = err instanceof MappingError ? err : new MappingError(describeError(err), err);
        this.droppedEvents++;
        this.logger.warn(`[relay] Dropping message ${raw.messageId} from ${raw.contact.nickname}: ${error.message}`);
        this.record(error);
      }
    }
  }

  private onChatMessage(message: RawChatMessage): void {
    const evicted = this.events.push(message);
    if (!evicted) return;
    this.droppedEvents++;
    const error = new OverloadError(`Event queue full, dropped message ${evicted.messageId} from ${evicted.contact.nickname}`);
    this.logger.warn(`[relay] ${error.message}`);
    this.record(error);
  }

  private onAction(action: ProtocolAction): void {
    if (!this.accepting) {
      this.droppedActions++;
      this.logger.warn(`[relay] Not accepting ${action.action} while stopping`);
      return;
    }
    const evicted = this.inbound.push(action);
    if (!evicted) return;
    this.droppedActions++;
    const error = new OverloadError(`Inbound queue full, dropped ${evicted.action}`);
    this.logger.warn(`[relay] ${error.message}`);
    this.record(error);
  }

  private record(error: RelayError): void {
    this.lastError = { kind: error.kind, message: error.message, at: this.now() };
  }

  private requireRunning(operation: string): void {
    if (!this.active) {
      throw new ValidationError(`${operation} needs a running relay; call start() first`);
    }
  }
}

export type { RelayConfig, EndpointConfig } from './config.js';
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './config.js';
export { ContactDirectory } from './contacts.js';
export { ReplyDispatcher } from './dispatcher.js';
export * from './errors.js';
export { HealthServer, routeStatusRequest } from './health-server.js';
export { createConsoleLogger, silentLogger, type Logger } from './log.js';
export { MediaStore } from './media.js';
export { ContactMonitor, advanceCursor } from './monitor.js';
export { MessageNormalizer } from './normalizer.js';
export { ProcessSurface } from './process-surface.js';
export { BoundedQueue } from './queue.js';
export type { ChatSurface, SurfaceMessage } from './surface.js';
export type * from './types.js';
export { WsClient, openWebSocket, type ConnectionState, type SocketFactory } from './ws-client.js';
