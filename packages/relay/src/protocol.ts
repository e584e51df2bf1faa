// OneBot v11 Protocol - Inbound frame schemas and outbound meta frames

import { z } from 'zod';
import { MappingError, describeError } from './errors.js';
import type { ActionResponse, HeartbeatEvent, LifecycleEvent, ProtocolAction } from './types.js';

export const WireSegmentSchema = z.object({
  type: z.string().min(1),
  data: z.record(z.unknown()).nullish().transform((data) => data ?? {}),
});

export const ActionFrameSchema = z.object({
  action: z.string().min(1),
  params: z
    .object({
      user_id: z.union([z.string(), z.number().int().nonnegative().safe()]).optional(),
      message_type: z.string().optional(),
      message: z.union([z.string(), z.array(WireSegmentSchema)]).optional(),
      auto_escape: z.union([z.boolean(), z.literal('true'), z.literal('false')]).optional(),
    })
    .passthrough()
    .optional(),
  echo: z.unknown().optional(),
});

export type ActionFrame = z.infer<typeof ActionFrameSchema>;

export type InboundFrame =
  | { type: 'action'; action: ProtocolAction }
  | { type: 'ignored'; reason: string };

/** Retcodes used in action responses. */
export const RETCODE = {
  ok: 0,
  badRequest: 1400,
  notFound: 1404,
  failed: 1500,
} as const;

/**
 * Parses one text frame from the remote endpoint. Throws MappingError for
 * frames that are not JSON or not shaped like anything OneBot sends.
 */
export function parseInboundFrame(text: string, receivedAt: number = Date.now()): InboundFrame {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new MappingError(`Frame is not valid JSON: ${describeError(err)}`);
  }

  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new MappingError('Frame is not a JSON object');
  }

  if (!('action' in json)) {
    const kind = 'post_type' in json ? `event ${String(json.post_type)}` : 'frame without action';
    return { type: 'ignored', reason: kind };
  }

  const parsed = ActionFrameSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new MappingError(`Malformed action frame: ${issues}`);
  }

  return { type: 'action', action: toProtocolAction(parsed.data, receivedAt) };
}

function toProtocolAction(frame: ActionFrame, receivedAt: number): ProtocolAction {
  const params = frame.params;
  return {
    action: frame.action,
    params: {
      userId: params?.user_id === undefined ? undefined : String(params.user_id),
      messageType: params?.message_type,
      message: params?.message,
      autoEscape: params?.auto_escape === true || params?.auto_escape === 'true',
    },
    echo: frame.echo,
    receivedAt,
  };
}

export function buildHeartbeat(selfId: number, intervalMs: number, now: number = Date.now()): HeartbeatEvent {
  return {
    time: Math.floor(now / 1000),
    self_id: selfId,
    post_type: 'meta_event',
    meta_event_type: 'heartbeat',
    status: { online: true, good: true },
    interval: intervalMs,
  };
}

export function buildLifecycle(
  selfId: number,
  subType: LifecycleEvent['sub_type'] = 'connect',
  now: number = Date.now(),
): LifecycleEvent {
  return {
    time: Math.floor(now / 1000),
    self_id: selfId,
    post_type: 'meta_event',
    meta_event_type: 'lifecycle',
    sub_type: subType,
  };
}

export function buildResponse(
  echo: unknown,
  retcode: number,
  data: Record<string, unknown> | null = null,
  message?: string,
): ActionResponse {
  const response: ActionResponse = {
    status: retcode === RETCODE.ok ? 'ok' : 'failed',
    retcode,
    data,
    echo,
  };
  if (message) response.message = message;
  return response;
}
