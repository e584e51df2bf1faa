// Reply Dispatcher - Turns inbound OneBot actions into chat sends
//
// Sends for one contact run strictly in arrival order; different contacts
// proceed concurrently. Failed sends are reported, never retried.

import type { ContactDirectory } from './contacts.js';
import { RelayError, TransientIOError, ValidationError, describeError } from './errors.js';
import type { Logger } from './log.js';
import { silentLogger } from './log.js';
import type { MessageNormalizer } from './normalizer.js';
import { RETCODE, buildResponse } from './protocol.js';
import { waitAtMost, type BoundedQueue } from './queue.js';
import type { ActionResponse, MonitoredContact, ProtocolAction, Segment, SendResult } from './types.js';

export interface ReplySender {
  send(contact: Readonly<MonitoredContact>, segments: Segment[]): Promise<SendResult>;
}

export type DispatchOutcome =
  | { status: 'answered'; action: string }
  | { status: 'delivered'; contact: string; result: SendResult; partial: boolean }
  | { status: 'failed'; contact: string; result: SendResult }
  | { status: 'rejected'; error: ValidationError };

export interface ReplyDispatcherOptions {
  inbound: BoundedQueue<ProtocolAction>;
  normalizer: MessageNormalizer;
  contacts: ContactDirectory;
  sender: ReplySender;
  /** Reported by get_login_info. */
  self: { userId: number; nickname: string };
  /** Reported by get_status. */
  health: () => { online: boolean; good: boolean };
  /** Set when actions carrying an echo should be answered. */
  respond?: (response: ActionResponse) => void;
  onError?: (error: RelayError) => void;
  logger?: Logger;
}

const SEND_ACTIONS = new Set(['send_private_msg', 'send_msg']);
const INFO_ACTIONS = new Set(['get_login_info', 'get_status']);

/** Why a ValidationError was raised; selects the response retcode. */
export type RejectReason = 'unsupported-action' | 'unknown-target';

function rejectReason(error: ValidationError): RejectReason | undefined {
  const details = error.details;
  if (typeof details !== 'object' || details === null || !('reason' in details)) return undefined;
  return details.reason === 'unsupported-action' || details.reason === 'unknown-target' ? details.reason : undefined;
}

export class ReplyDispatcher {
  private options: ReplyDispatcherOptions;
  private logger: Logger;
  private chains = new Map<string, Promise<unknown>>();
  private pending = new Set<Promise<DispatchOutcome>>();
  private loop: Promise<void> | null = null;
  private active = false;
  private messageSeq = 0;

  private counts = { delivered: 0, failed: 0, rejected: 0 };

  constructor(options: ReplyDispatcherOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  get running(): boolean {
    return this.active;
  }

  get stats(): { delivered: number; failed: number; rejected: number; inFlight: number } {
    return { ...this.counts, inFlight: this.pending.size };
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.options.inbound.reopen();
    this.loop = this.run();
  }

  /**
   * Stops taking new actions and waits up to `graceMs` for queued and
   * in-flight sends. Whatever is still queued afterwards is discarded.
   */
  async stop(graceMs: number): Promise<number> {
    if (!this.active) return 0;
    this.active = false;

    const drained = (async () => {
      await this.options.inbound.whenEmpty();
      await Promise.allSettled([...this.pending]);
    })();
    await waitAtMost(drained, graceMs);

    this.options.inbound.close();
    const discarded = this.options.inbound.clear().length;
    await this.loop;
    this.loop = null;
    if (discarded > 0) {
      this.logger.warn(`[dispatcher] Discarded ${discarded} queued action(s) on stop`);
    }
    return discarded;
  }

  /**
   * Resolves and sends one action. The returned promise settles once the send
   * for this action has completed.
   */
  dispatch(action: ProtocolAction): Promise<DispatchOutcome> {
    if (INFO_ACTIONS.has(action.action)) {
      return Promise.resolve(this.inform(action));
    }

    let contact: Readonly<MonitoredContact>;
    let segments: Segment[];
    let partial: boolean;
    try {
      this.checkAction(action);
      const args = this.options.normalizer.toSendArgs(action, this.options.contacts.snapshot());
      contact = args.contact;
      segments = args.segments;
      partial = args.partial;
      if (partial) {
        const kinds = args.dropped.map((s) => s.type).join(', ');
        this.report(new ValidationError(`Dropped unsupported segment(s) for "${contact.nickname}": ${kinds}`, { dropped: args.dropped }));
      }
    } catch (err) {
      const error = err instanceof ValidationError ? err : new ValidationError(describeError(err), err);
      return Promise.resolve(this.reject(action, error));
    }

    const key = contact.nickname;
    const previous = this.chains.get(key) ?? Promise.resolve();
    const outcome = previous.then(() => this.deliver(action, contact, segments, partial));
    this.chains.set(key, outcome);
    this.pending.add(outcome);

    void outcome.finally(() => {
      this.pending.delete(outcome);
      if (this.chains.get(key) === outcome) this.chains.delete(key);
    });
    return outcome;
  }

  private async run(): Promise<void> {
    const { inbound } = this.options;
    while (this.active || inbound.size > 0) {
      const action = await inbound.take();
      if (!action) break;
      void this.dispatch(action);
    }
  }

  private checkAction(action: ProtocolAction): void {
    if (!SEND_ACTIONS.has(action.action)) {
      throw new ValidationError(`Unsupported action "${action.action}"`, { reason: 'unsupported-action' });
    }
    const type = action.params.messageType;
    if (action.action === 'send_msg' && type !== undefined && type !== 'private') {
      throw new ValidationError(`Unsupported message_type "${type}" for send_msg`);
    }
  }

  private async deliver(
    action: ProtocolAction,
    contact: Readonly<MonitoredContact>,
    segments: Segment[],
    partial: boolean,
  ): Promise<DispatchOutcome> {
    let result: SendResult;
    try {
      result = await this.options.sender.send(contact, segments);
    } catch (err) {
      result = { ok: false, delivered: 0, error: describeError(err) };
    }

    if (!result.ok) {
      this.counts.failed++;
      const error = new TransientIOError(`Send to "${contact.nickname}" failed: ${result.error ?? 'unknown error'}`, { action: action.action });
      this.logger.error(`[dispatcher] ${error.message}`);
      this.report(error);
      this.answer(action, RETCODE.failed, null, error.message);
      return { status: 'failed', contact: contact.nickname, result };
    }

    this.counts.delivered++;
    this.logger.info(`[dispatcher] Delivered ${action.action} to ${contact.nickname}${partial ? ' (partial)' : ''}`);
    this.answer(action, RETCODE.ok, { message_id: ++this.messageSeq });
    return { status: 'delivered', contact: contact.nickname, result, partial };
  }

  /** Answers the read-only info actions; no contact is involved. */
  private inform(action: ProtocolAction): DispatchOutcome {
    if (action.action === 'get_login_info') {
      const { userId, nickname } = this.options.self;
      this.answer(action, RETCODE.ok, { user_id: userId, nickname });
    } else {
      this.answer(action, RETCODE.ok, { ...this.options.health() });
    }
    this.logger.debug(`[dispatcher] Answered ${action.action}`);
    return { status: 'answered', action: action.action };
  }

  private reject(action: ProtocolAction, error: ValidationError): DispatchOutcome {
    this.counts.rejected++;
    this.logger.warn(`[dispatcher] Rejected ${action.action}: ${error.message}`);
    this.report(error);
    const retcode = rejectReason(error) ? RETCODE.notFound : RETCODE.badRequest;
    this.answer(action, retcode, null, error.message);
    return { status: 'rejected', error };
  }

  private answer(action: ProtocolAction, retcode: number, data: Record<string, unknown> | null, message?: string): void {
    if (!this.options.respond || action.echo === undefined) return;
    try {
      this.options.respond(buildResponse(action.echo, retcode, data, message));
    } catch (err) {
      this.logger.warn(`[dispatcher] Failed to answer ${action.action}: ${describeError(err)}`);
    }
  }

  private report(error: RelayError): void {
    this.options.onError?.(error);
  }
}
