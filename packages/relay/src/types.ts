// Relay Types - Contacts, chat messages and OneBot v11 frames

export interface MonitoredContact {
  /** Display nickname as shown in the desktop chat client. */
  nickname: string;
  /** Stable numeric id used as the OneBot user_id. */
  userId?: string;
}

export type PayloadKind = 'text' | 'image' | 'file';

// Observed inbound chat message (desktop surface -> relay)
export interface RawChatMessage {
  readonly contact: Readonly<MonitoredContact>;
  readonly messageId: string;
  /** Milliseconds since epoch. */
  readonly timestamp: number;
  readonly kind: PayloadKind;
  readonly text?: string;
  /** Local filesystem reference for image and file payloads. */
  readonly path?: string;
  readonly fileName?: string;
}

// --- OneBot v11 message segments ---

export interface TextSegment {
  type: 'text';
  data: { text: string };
}

export interface ImageSegment {
  type: 'image';
  data: { file: string };
}

export interface FileSegment {
  type: 'file';
  data: { file: string; name?: string };
}

export type Segment = TextSegment | ImageSegment | FileSegment;

export type SegmentType = Segment['type'];

export const SUPPORTED_SEGMENT_TYPES: readonly SegmentType[] = ['text', 'image', 'file'];

/** A segment as it arrived on the wire, before its kind is checked. */
export interface WireSegment {
  type: string;
  data: Record<string, unknown>;
}

// --- OneBot v11 outbound frames ---

export interface PrivateMessageEvent {
  time: number;
  self_id: number;
  post_type: 'message';
  message_type: 'private';
  sub_type: 'friend';
  message_id: number;
  user_id: number;
  message: Segment[];
  raw_message: string;
  font: 0;
  sender: {
    user_id: number;
    nickname: string;
    sex: 'unknown';
    age: 0;
  };
}

export interface ProtocolEvent {
  /** `<selfId>:<seq>`; unique for the lifetime of the process. */
  eventId: string;
  frame: PrivateMessageEvent;
}

export interface HeartbeatEvent {
  time: number;
  self_id: number;
  post_type: 'meta_event';
  meta_event_type: 'heartbeat';
  status: { online: boolean; good: boolean };
  interval: number;
}

export interface LifecycleEvent {
  time: number;
  self_id: number;
  post_type: 'meta_event';
  meta_event_type: 'lifecycle';
  sub_type: 'connect' | 'enable' | 'disable';
}

export interface ActionResponse {
  status: 'ok' | 'failed';
  retcode: number;
  data: Record<string, unknown> | null;
  echo: unknown;
  message?: string;
}

export type OutboundFrame = PrivateMessageEvent | HeartbeatEvent | LifecycleEvent | ActionResponse;

// --- OneBot v11 inbound action (remote endpoint -> relay) ---

export interface ProtocolAction {
  action: string;
  params: {
    userId?: string;
    messageType?: string;
    /** Segment array, or a CQ-code string. */
    message?: WireSegment[] | string;
    autoEscape: boolean;
  };
  echo?: unknown;
  receivedAt: number;
}

export interface SendArgs {
  contact: MonitoredContact;
  segments: Segment[];
  dropped: WireSegment[];
  partial: boolean;
}

export interface SendResult {
  ok: boolean;
  /** Number of segments delivered before stopping. */
  delivered: number;
  error?: string;
}

// --- Status ---

export type ConnectionStateName = 'disconnected' | 'connecting' | 'connected' | 'closing';

export interface LastError {
  kind: string;
  message: string;
  at: number;
}

export interface RelayStatus {
  running: boolean;
  monitor: {
    running: boolean;
    degraded: boolean;
    consecutiveFailures: number;
  };
  transport: {
    running: boolean;
    connection: ConnectionStateName;
    endpoint: string | null;
    buffered: number;
    bufferOverflows: number;
  };
  contacts: number;
  droppedEvents: number;
  rejectedActions: number;
  failedSends: number;
  lastError: LastError | null;
  uptimeMs: number;
}
