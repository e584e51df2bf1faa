import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MappingError, OverloadError, TransientIOError } from './errors.js';
import { createSocketFactory, type FakeSocket } from './test-helpers.js';
import type { ProtocolEvent } from './types.js';
import { WsClient, canTransition, type ConnectionState, type WsClientOptions } from './ws-client.js';

function event(seq: number): ProtocolEvent {
  return {
    eventId: `10001000:${seq}`,
    frame: {
      time: 1,
      self_id: 10001000,
      post_type: 'message',
      message_type: 'private',
      sub_type: 'friend',
      message_id: seq,
      user_id: 12345,
      message: [{ type: 'text', data: { text: `m${seq}` } }],
      raw_message: `m${seq}`,
      font: 0,
      sender: { user_id: 12345, nickname: 'Alice', sex: 'unknown', age: 0 },
    },
  };
}

describe('canTransition', () => {
  it('should only allow the documented state changes', () => {
    expect(canTransition('disconnected', 'connecting')).toBe(true);
    expect(canTransition('disconnected', 'connected')).toBe(false);
    expect(canTransition('connected', 'closing')).toBe(true);
    expect(canTransition('closing', 'connecting')).toBe(false);
  });
});

describe('WsClient', () => {
  let sockets: FakeSocket[];
  let onAction: ReturnType<typeof vi.fn>;
  let onError: ReturnType<typeof vi.fn>;
  let states: ConnectionState['name'][];

  function createClient(overrides: Partial<WsClientOptions> = {}): WsClient {
    const fake = createSocketFactory();
    sockets = fake.sockets;
    return new WsClient({
      endpoint: { url: 'ws://bot.test/onebot', accessToken: 'test-secret' },
      selfId: '10001000',
      bufferCapacity: 3,
      heartbeatIntervalMs: 15_000,
      heartbeatTimeoutMs: 45_000,
      reconnect: { initialDelayMs: 1_000, maxDelayMs: 30_000, stabilityWindowMs: 10_000 },
      onAction,
      onError,
      onStateChange: (state) => states.push(state.name),
      socketFactory: fake.factory,
      now: () => Date.now(),
      ...overrides,
    });
  }

  function latest(): FakeSocket {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('no socket opened');
    return socket;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    onAction = vi.fn();
    onError = vi.fn();
    states = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should connect with the OneBot handshake headers', () => {
    const client = createClient();

    client.start();

    expect(client.state.name).toBe('connecting');
    expect(latest().url).toBe('ws://bot.test/onebot');
    expect(latest().headers).toEqual({
      'X-Self-ID': '10001000',
      'X-Client-Role': 'Universal',
      Authorization: 'Bearer test-secret',
    });
  });

  it('should leave out Authorization without a token', () => {
    const client = createClient({ endpoint: { url: 'ws://bot.test/onebot' } });

    client.start();

    expect(latest().headers).not.toHaveProperty('Authorization');
  });

  it('should announce itself with a lifecycle event on open', () => {
    const client = createClient();
    client.start();

    latest().handlers.onOpen();

    expect(client.state.name).toBe('connected');
    expect(latest().frames()[0]).toMatchObject({ post_type: 'meta_event', meta_event_type: 'lifecycle', sub_type: 'connect' });
    expect(states).toEqual(['connecting', 'connected']);
  });

  it('should buffer events while disconnected and flush them in order', () => {
    const client = createClient();

    expect(client.send(event(1))).toBe('buffered');
    expect(client.send(event(2))).toBe('buffered');
    expect(client.buffered).toBe(2);

    client.start();
    latest().handlers.onOpen();

    expect(latest().frames().map((f) => f.message_id ?? f.meta_event_type)).toEqual(['lifecycle', 1, 2]);
    expect(client.buffered).toBe(0);
    expect(client.send(event(3))).toBe('sent');
  });

  it('should evict the oldest buffered event when the buffer is full', () => {
    const client = createClient();

    for (let seq = 1; seq <= 4; seq++) client.send(event(seq));

    expect(client.buffered).toBe(3);
    expect(client.bufferOverflows).toBe(1);
    expect(onError).toHaveBeenCalledWith(expect.any(OverloadError));
    expect(onError.mock.calls[0][0].message).toBe('Outbound buffer full (3), dropped event 10001000:1');

    client.start();
    latest().handlers.onOpen();
    expect(latest().frames().slice(1).map((f) => f.message_id)).toEqual([2, 3, 4]);
  });

  it('should pass action frames on and discard malformed ones', () => {
    const client = createClient();
    client.start();
    const socket = latest();
    socket.handlers.onOpen();

    socket.handlers.onMessage('{not json');
    socket.handlers.onMessage(JSON.stringify({ action: 'send_private_msg', params: { user_id: 12345, message: 'hi' } }));

    expect(onError).toHaveBeenCalledWith(expect.any(MappingError));
    expect(onAction).toHaveBeenCalledTimes(1);
    expect(onAction.mock.calls[0][0]).toMatchObject({ action: 'send_private_msg', params: { userId: '12345', message: 'hi' } });
    expect(client.state.name).toBe('connected');
  });

  it('should back off 1s, 2s, 4s between failed attempts', async () => {
    const client = createClient();
    client.start();

    latest().handlers.onClose(1006, '');
    await vi.advanceTimersByTimeAsync(999);
    expect(sockets).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(sockets).toHaveLength(2);

    latest().handlers.onClose(1006, '');
    await vi.advanceTimersByTimeAsync(1_999);
    expect(sockets).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(sockets).toHaveLength(3);

    latest().handlers.onClose(1006, '');
    await vi.advanceTimersByTimeAsync(4_000);
    expect(sockets).toHaveLength(4);
    expect(client.nextReconnectDelay).toBe(8_000);
  });

  it('should reset the backoff after staying connected for the stability window', async () => {
    const client = createClient();
    client.start();
    latest().handlers.onClose(1006, '');
    await vi.advanceTimersByTimeAsync(1_000);
    latest().handlers.onClose(1006, '');
    await vi.advanceTimersByTimeAsync(2_000);

    latest().handlers.onOpen();
    await vi.advanceTimersByTimeAsync(9_999);
    expect(client.nextReconnectDelay).toBe(4_000);
    await vi.advanceTimersByTimeAsync(1);
    expect(client.nextReconnectDelay).toBe(1_000);

    latest().handlers.onClose(1006, '');
    await vi.advanceTimersByTimeAsync(1_000);
    expect(sockets).toHaveLength(4);
  });

  it('should send heartbeats and drop a silent connection', async () => {
    const client = createClient();
    client.start();
    const socket = latest();
    socket.handlers.onOpen();

    await vi.advanceTimersByTimeAsync(45_000);
    const heartbeats = socket.frames().filter((f) => f.meta_event_type === 'heartbeat');
    expect(heartbeats).toHaveLength(3);
    expect(heartbeats[0]).toMatchObject({ self_id: 10001000, interval: 15_000 });
    expect(socket.pings).toBe(3);

    await vi.advanceTimersByTimeAsync(15_000);
    expect(socket.terminated).toBe(true);
    expect(client.state.name).toBe('disconnected');
    expect(onError).toHaveBeenCalledWith(expect.any(TransientIOError));

    await vi.advanceTimersByTimeAsync(1_000);
    expect(sockets).toHaveLength(2);
  });

  it('should treat pongs as traffic', async () => {
    const client = createClient();
    client.start();
    const socket = latest();
    socket.handlers.onOpen();

    for (let i = 0; i < 6; i++) {
      await vi.advanceTimersByTimeAsync(15_000);
      socket.handlers.onPong();
    }

    expect(socket.terminated).toBe(false);
    expect(client.state.name).toBe('connected');
  });

  it('should pass through closing on stop and never reconnect', async () => {
    const client = createClient();
    client.start();
    latest().handlers.onOpen();

    await client.stop();

    expect(states).toEqual(['connecting', 'connected', 'closing', 'disconnected']);
    expect(latest().closed).toEqual({ code: 1000, reason: 'relay stopping' });
    expect(client.running).toBe(false);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(sockets).toHaveLength(1);
  });

  it('should terminate a socket that does not finish closing', async () => {
    const client = createClient();
    client.start();
    const socket = latest();
    socket.handlers.onOpen();
    socket.autoClose = false;

    const stopping = client.stop();
    expect(client.state.name).toBe('closing');
    await vi.advanceTimersByTimeAsync(1_000);
    await stopping;

    expect(socket.terminated).toBe(true);
    expect(client.state.name).toBe('disconnected');
  });

  it('should share one close handshake between overlapping stops', async () => {
    const client = createClient();
    client.start();
    const socket = latest();
    socket.handlers.onOpen();
    socket.autoClose = false;

    const first = client.stop();
    const second = client.stop();
    expect(second).toBe(first);

    socket.handlers.onClose(1000, 'relay stopping');
    await Promise.all([first, second]);

    expect(socket.terminated).toBe(false);
    expect(states).toEqual(['connecting', 'connected', 'closing', 'disconnected']);
  });

  it('should buffer an event instead of writing to a closing socket', async () => {
    const client = createClient();
    client.start();
    const first = latest();
    first.handlers.onOpen();
    first.open = false;

    expect(client.send(event(1))).toBe('buffered');
    expect(client.buffered).toBe(1);
    expect(first.terminated).toBe(true);
    expect(first.frames().map((f) => f.meta_event_type)).toEqual(['lifecycle']);
    expect(client.state.name).toBe('disconnected');

    await vi.advanceTimersByTimeAsync(1_000);
    latest().handlers.onOpen();

    expect(sockets).toHaveLength(2);
    expect(latest().frames().map((f) => f.message_id ?? f.meta_event_type)).toEqual(['lifecycle', 1]);
    expect(client.buffered).toBe(0);
  });

  it('should reconnect at once when the endpoint changes', () => {
    const client = createClient();
    client.start();
    const first = latest();
    first.handlers.onOpen();

    client.reconfigure({ url: 'ws://other.test/onebot' });

    expect(first.closed).toEqual({ code: 1000, reason: 'endpoint changed' });
    expect(sockets).toHaveLength(2);
    expect(latest().url).toBe('ws://other.test/onebot');
    expect(client.url).toBe('ws://other.test/onebot');
  });

  it('should only answer actions on a live connection', () => {
    const client = createClient();
    const response = { status: 'ok' as const, retcode: 0, data: null, echo: 'e1' };

    expect(client.sendResponse(response)).toBe(false);

    client.start();
    latest().handlers.onOpen();

    expect(client.sendResponse(response)).toBe(true);
    expect(latest().frames()[1]).toEqual(response);
  });

  it('should ignore events from a replaced socket', () => {
    const client = createClient();
    client.start();
    const first = latest();
    first.handlers.onOpen();
    client.reconfigure({ url: 'ws://other.test/onebot' });

    first.handlers.onMessage(JSON.stringify({ action: 'send_private_msg', params: { user_id: 1, message: 'x' } }));
    first.handlers.onClose(1006, '');

    expect(onAction).not.toHaveBeenCalled();
    expect(client.state.name).toBe('connecting');
  });
});
