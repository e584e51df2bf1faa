// Contact Monitor - Polls the desktop chat surface and sends replies through it

import type { ContactDirectory, ContactSnapshot } from './contacts.js';
import { RelayError, TransientIOError, describeError, toTransient } from './errors.js';
import type { Logger } from './log.js';
import { silentLogger } from './log.js';
import type { MediaResolver } from './media.js';
import type { ChatSurface, SurfaceMessage } from './surface.js';
import type { MonitoredContact, RawChatMessage, Segment, SendResult } from './types.js';

export interface ContactMonitorOptions {
  surface: ChatSurface;
  contacts: ContactDirectory;
  media: MediaResolver;
  pollIntervalMs: number;
  echoWindowMs: number;
  degradedAfterFailures: number;
  onMessage: (message: RawChatMessage) => void;
  onError?: (error: RelayError) => void;
  logger?: Logger;
  now?: () => number;
}

/** Last-seen marker for one contact. */
export interface Cursor {
  timestamp: number;
  /** Ids already emitted (or skipped) at exactly `timestamp`. */
  ids: ReadonlySet<string>;
}

/** Relayed texts remembered per contact for echo suppression. */
const MAX_ECHOES_PER_CONTACT = 50;

interface SentEcho {
  text: string;
  at: number;
}

/**
 * Splits a contact's visible messages into the ones not seen before and the
 * cursor to use next time. Without a cursor nothing is fresh: the marker
 * starts at `now` so backlog is never replayed.
 */
export function advanceCursor(
  cursor: Cursor | undefined,
  messages: SurfaceMessage[],
  now: number,
): { cursor: Cursor; fresh: SurfaceMessage[] } {
  const ordered = [...messages].sort((a, b) => a.timestamp - b.timestamp);

  if (!cursor) {
    const newest = ordered.length > 0 ? ordered[ordered.length - 1].timestamp : now;
    const timestamp = Math.max(now, newest);
    const ids = new Set(ordered.filter((m) => m.timestamp === timestamp).map((m) => m.id));
    return { cursor: { timestamp, ids }, fresh: [] };
  }

  const fresh: SurfaceMessage[] = [];
  const taken = new Set<string>();
  for (const message of ordered) {
    const isNew =
      message.timestamp > cursor.timestamp ||
      (message.timestamp === cursor.timestamp && !cursor.ids.has(message.id));
    if (isNew && !taken.has(message.id)) {
      taken.add(message.id);
      fresh.push(message);
    }
  }

  if (fresh.length === 0) return { cursor, fresh };

  const timestamp = fresh[fresh.length - 1].timestamp;
  const atNewest = fresh.filter((m) => m.timestamp === timestamp).map((m) => m.id);
  const ids = timestamp === cursor.timestamp ? new Set([...cursor.ids, ...atNewest]) : new Set(atNewest);
  return { cursor: { timestamp, ids }, fresh };
}

export class ContactMonitor {
  private options: ContactMonitorOptions;
  private logger: Logger;
  private now: () => number;
  private cursors = new Map<string, Cursor>();
  private echoes = new Map<string, SentEcho[]>();
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<unknown> | null = null;
  private attached = false;
  private active = false;
  private polling = false;
  private failures = 0;

  constructor(options: ContactMonitorOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.active;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get degraded(): boolean {
    return this.failures >= this.options.degradedAfterFailures;
  }

  /** Contacts that currently have a cursor. */
  get trackedContacts(): string[] {
    return [...this.cursors.keys()];
  }

  /** Relayed texts still waiting to be recognized as echoes. */
  echoCount(nickname: string): number {
    return this.echoes.get(nickname)?.length ?? 0;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.polling = true;
    this.logger.info(`[monitor] Polling ${this.options.contacts.size} contact(s) every ${this.options.pollIntervalMs}ms via ${this.options.surface.name}`);
    this.schedule(0);
  }

  /** Stops scheduling polls and waits for the current one. Sends keep working. */
  async stopPolling(): Promise<void> {
    this.polling = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
  }

  async stop(): Promise<void> {
    if (!this.active) return;
    await this.stopPolling();
    this.active = false;
    if (this.attached) {
      this.attached = false;
      try {
        await this.options.surface.detach();
      } catch (err) {
        this.logger.warn(`[monitor] Failed to detach from ${this.options.surface.name}: ${describeError(err)}`);
      }
    }
    this.cursors.clear();
    this.echoes.clear();
    this.logger.info('[monitor] Stopped');
  }

  /**
   * One poll cycle over the current contact snapshot. Emits every new message
   * through `onMessage` and returns them. Surface failures are counted, never
   * thrown.
   */
  async poll(): Promise<RawChatMessage[]> {
    const snapshot = this.options.contacts.snapshot();
    this.pruneCursors(snapshot);

    const emitted: RawChatMessage[] = [];
    let failed = false;

    try {
      await this.ensureAttached();
    } catch (err) {
      this.recordFailure(toTransient(err, `Cannot reach ${this.options.surface.name}`));
      return emitted;
    }

    for (const contact of snapshot) {
      let visible: SurfaceMessage[];
      try {
        visible = await this.options.surface.readMessages(contact.nickname);
      } catch (err) {
        failed = true;
        this.logger.warn(`[monitor] Failed to read messages for ${contact.nickname}: ${describeError(err)}`);
        continue;
      }

      const now = this.now();
      const { cursor, fresh } = advanceCursor(this.cursors.get(contact.nickname), visible, now);
      this.cursors.set(contact.nickname, cursor);

      for (const message of fresh) {
        const raw = this.toRawMessage(contact, message, now);
        if (!raw) continue;
        emitted.push(raw);
        this.options.onMessage(raw);
      }
    }

    if (failed) {
      this.recordFailure(new TransientIOError(`Poll cycle on ${this.options.surface.name} had read failures`));
    } else if (this.failures > 0) {
      this.logger.info(`[monitor] Surface reachable again after ${this.failures} failed cycle(s)`);
      this.failures = 0;
    }

    return emitted;
  }

  /**
   * Sends segments to a contact in order. Stops at the first failure; segments
   * already delivered stay delivered.
   */
  async send(contact: Readonly<MonitoredContact>, segments: Segment[]): Promise<SendResult> {
    if (!this.active) {
      return { ok: false, delivered: 0, error: 'Contact monitor is not running' };
    }

    let delivered = 0;
    try {
      await this.ensureAttached();
      for (const segment of segments) {
        await this.sendSegment(contact.nickname, segment);
        delivered++;
      }
    } catch (err) {
      const error = describeError(err);
      this.logger.error(`[monitor] Send to ${contact.nickname} failed after ${delivered}/${segments.length} segment(s): ${error}`);
      return { ok: false, delivered, error };
    }

    this.logger.info(`[monitor] Sent ${delivered} segment(s) to ${contact.nickname}`);
    return { ok: true, delivered };
  }

  private async sendSegment(nickname: string, segment: Segment): Promise<void> {
    const { surface } = this.options;
    switch (segment.type) {
      case 'text':
        this.rememberEcho(nickname, segment.data.text);
        await surface.sendText(nickname, segment.data.text);
        break;
      case 'image':
        await this.sendMedia(nickname, segment.data.file);
        break;
      case 'file':
        await this.sendMedia(nickname, segment.data.file, segment.data.name);
        break;
    }
  }

  private async sendMedia(nickname: string, reference: string, name?: string): Promise<void> {
    const { surface, media } = this.options;
    const path = await media.resolve(reference, name);
    try {
      await surface.sendFile(nickname, path);
    } finally {
      await media.release(path);
    }
  }

  private toRawMessage(contact: Readonly<MonitoredContact>, message: SurfaceMessage, now: number): RawChatMessage | null {
    if (message.fromSelf || message.system) {
      this.logger.debug(`[monitor] Skipping ${message.system ? 'system notice' : 'own message'} ${message.id} in ${contact.nickname}`);
      return null;
    }
    if (message.kind === 'text' && this.consumeEcho(contact.nickname, message.text ?? '', now)) {
      this.logger.debug(`[monitor] Skipping echo of relayed text in ${contact.nickname}`);
      return null;
    }

    return Object.freeze({
      contact,
      messageId: message.id,
      timestamp: message.timestamp,
      kind: message.kind,
      text: message.text,
      path: message.path,
      fileName: message.fileName,
    });
  }

  private rememberEcho(nickname: string, text: string): void {
    if (this.options.echoWindowMs <= 0) return;
    const now = this.now();
    const list = (this.echoes.get(nickname) ?? []).filter((e) => now - e.at <= this.options.echoWindowMs);
    list.push({ text, at: now });
    this.echoes.set(nickname, list.slice(-MAX_ECHOES_PER_CONTACT));
  }

  private consumeEcho(nickname: string, text: string, now: number): boolean {
    const list = this.echoes.get(nickname);
    if (!list) return false;
    const live = list.filter((e) => now - e.at <= this.options.echoWindowMs);
    const index = live.findIndex((e) => e.text === text);
    if (index !== -1) live.splice(index, 1);
    if (live.length > 0) this.echoes.set(nickname, live);
    else this.echoes.delete(nickname);
    return index !== -1;
  }

  private pruneCursors(snapshot: ContactSnapshot): void {
    const live = new Set(snapshot.map((c) => c.nickname));
    for (const nickname of this.cursors.keys()) {
      if (!live.has(nickname)) {
        this.cursors.delete(nickname);
        this.echoes.delete(nickname);
        this.logger.debug(`[monitor] Dropped cursor for removed contact ${nickname}`);
      }
    }
  }

  private async ensureAttached(): Promise<void> {
    if (this.attached) return;
    await this.options.surface.attach();
    this.attached = true;
    this.logger.info(`[monitor] Attached to ${this.options.surface.name}`);
  }

  private recordFailure(error: TransientIOError): void {
    this.failures++;
    this.attached = this.attached && this.failures < this.options.degradedAfterFailures;
    if (this.failures === this.options.degradedAfterFailures) {
      this.logger.error(`[monitor] Degraded after ${this.failures} consecutive failed polls: ${error.message}`);
    } else {
      this.logger.warn(`[monitor] Poll failed (${this.failures} in a row): ${error.message}`);
    }
    this.options.onError?.(error);
  }

  private schedule(delayMs: number): void {
    if (!this.polling) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      const cycle = this.poll();
      this.inFlight = cycle;
      void cycle
        .catch((err) => {
          this.logger.error(`[monitor] Poll cycle crashed: ${describeError(err)}`);
        })
        .finally(() => {
          this.inFlight = null;
          this.schedule(this.options.pollIntervalMs);
        });
    }, delayMs);
  }
}
