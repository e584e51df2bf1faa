// Message Normalizer - Chat messages <-> OneBot v11 events and actions
//
// No I/O. Media references pass through untouched; fetching or saving bytes
// belongs to the media store.

import { basename } from 'node:path';
import { pathToFileURL } from 'node:url';
import { resolveContact, type ContactSnapshot } from './contacts.js';
import { parseCqCode, renderCqCode } from './cq-code.js';
import { MappingError, ValidationError } from './errors.js';
import type {
  PrivateMessageEvent,
  ProtocolAction,
  ProtocolEvent,
  RawChatMessage,
  Segment,
  SendArgs,
  WireSegment,
} from './types.js';

export interface MessageNormalizerOptions {
  selfId: string;
}

export class MessageNormalizer {
  private selfId: string;
  private selfIdNumber: number;
  private seq = 0;

  constructor(options: MessageNormalizerOptions) {
    this.selfId = options.selfId;
    this.selfIdNumber = toWireId(options.selfId, 'self id');
  }

  /** Number of events produced so far; the next event gets `sequence + 1`. */
  get sequence(): number {
    return this.seq;
  }

  toProtocolEvent(raw: RawChatMessage): ProtocolEvent {
    const { contact } = raw;
    if (contact.userId === undefined) {
      throw new MappingError(`Contact "${contact.nickname}" has no numeric id; cannot map message ${raw.messageId}`);
    }
    const userId = toWireId(contact.userId, `id of "${contact.nickname}"`);
    const segment = toSegment(raw);

    const seq = ++this.seq;
    const frame: PrivateMessageEvent = {
      time: Math.floor(raw.timestamp / 1000),
      self_id: this.selfIdNumber,
      post_type: 'message',
      message_type: 'private',
      sub_type: 'friend',
      message_id: seq,
      user_id: userId,
      message: [segment],
      raw_message: renderCqCode([segment]),
      font: 0,
      sender: {
        user_id: userId,
        nickname: contact.nickname,
        sex: 'unknown',
        age: 0,
      },
    };

    return { eventId: `${this.selfId}:${seq}`, frame };
  }

  /**
   * Resolves a send action against the contact snapshot. Unsupported segments
   * are dropped one by one and flagged as a partial delivery.
   */
  toSendArgs(action: ProtocolAction, contacts: ContactSnapshot): SendArgs {
    const target = action.params.userId;
    if (!target) {
      throw new ValidationError(`Action ${action.action} has no user_id`);
    }

    const contact = resolveContact(target, contacts);
    if (!contact) {
      throw new ValidationError(`Unknown contact "${target}"`, { target, reason: 'unknown-target' });
    }

    const wire = toWireSegments(action);
    if (wire.length === 0) {
      throw new ValidationError(`Action ${action.action} for "${contact.nickname}" has an empty message`);
    }

    const segments: Segment[] = [];
    const dropped: WireSegment[] = [];
    for (const item of wire) {
      const segment = fromWireSegment(item);
      if (segment) segments.push(segment);
      else dropped.push(item);
    }

    if (segments.length === 0) {
      const kinds = dropped.map((s) => s.type).join(', ');
      throw new ValidationError(`No deliverable segments for "${contact.nickname}" (unsupported: ${kinds})`, { dropped });
    }

    return { contact, segments, dropped, partial: dropped.length > 0 };
  }
}

function toSegment(raw: RawChatMessage): Segment {
  switch (raw.kind) {
    case 'text':
      return { type: 'text', data: { text: raw.text ?? '' } };
    case 'image':
      if (!raw.path) throw new MappingError(`Image message ${raw.messageId} has no file reference`);
      return { type: 'image', data: { file: toFileReference(raw.path) } };
    case 'file': {
      if (!raw.path) throw new MappingError(`File message ${raw.messageId} has no file reference`);
      return {
        type: 'file',
        data: { file: toFileReference(raw.path), name: raw.fileName ?? basename(raw.path) },
      };
    }
  }
}

function toFileReference(path: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(path) ? path : pathToFileURL(path).href;
}

function toWireSegments(action: ProtocolAction): WireSegment[] {
  const { message, autoEscape } = action.params;
  if (message === undefined) return [];
  if (typeof message !== 'string') return message;
  if (message === '') return [];
  return autoEscape ? [{ type: 'text', data: { text: message } }] : parseCqCode(message);
}

function fromWireSegment(wire: WireSegment): Segment | null {
  const { data } = wire;
  switch (wire.type) {
    case 'text': {
      const text = data.text;
      if (typeof text === 'string') return { type: 'text', data: { text } };
      if (typeof text === 'number') return { type: 'text', data: { text: String(text) } };
      return null;
    }
    case 'image': {
      const file = stringField(data, 'file') ?? stringField(data, 'url');
      return file ? { type: 'image', data: { file } } : null;
    }
    case 'file': {
      const file = stringField(data, 'file') ?? stringField(data, 'url');
      if (!file) return null;
      const name = stringField(data, 'name');
      return { type: 'file', data: name ? { file, name } : { file } };
    }
    default:
      return null;
  }
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function toWireId(value: string, label: string): number {
  const id = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(id)) {
    throw new MappingError(`The ${label} "${value}" is not a usable numeric id`);
  }
  return id;
}
