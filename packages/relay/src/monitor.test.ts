import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ContactDirectory } from './contacts.js';
import { TransientIOError } from './errors.js';
import type { MediaResolver } from './media.js';
import { ContactMonitor, advanceCursor, type ContactMonitorOptions } from './monitor.js';
import { FakeSurface, textMessage } from './test-helpers.js';

describe('advanceCursor', () => {
  it('should seed at the newest visible message without emitting backlog', () => {
    const result = advanceCursor(undefined, [textMessage('m1', 100, 'old'), textMessage('m2', 200, 'older')], 150);

    expect(result.fresh).toEqual([]);
    expect(result.cursor.timestamp).toBe(200);
    expect([...result.cursor.ids]).toEqual(['m2']);
  });

  it('should seed at now when every visible message is older', () => {
    const result = advanceCursor(undefined, [textMessage('m1', 100, 'old')], 1_000);

    expect(result.cursor.timestamp).toBe(1_000);
    expect(result.cursor.ids.size).toBe(0);
  });

  it('should emit messages after the cursor in chronological order', () => {
    const cursor = { timestamp: 200, ids: new Set(['m2']) };
    const result = advanceCursor(
      cursor,
      [textMessage('m4', 300, 'c'), textMessage('m2', 200, 'a'), textMessage('m3', 200, 'b'), textMessage('m1', 100, 'z')],
      0,
    );

    expect(result.fresh.map((m) => m.id)).toEqual(['m3', 'm4']);
    expect(result.cursor.timestamp).toBe(300);
    expect([...result.cursor.ids]).toEqual(['m4']);
  });

  it('should merge ids when new messages share the cursor timestamp', () => {
    const result = advanceCursor({ timestamp: 200, ids: new Set(['m2']) }, [textMessage('m2', 200, 'a'), textMessage('m3', 200, 'b')], 0);

    expect(result.fresh.map((m) => m.id)).toEqual(['m3']);
    expect([...result.cursor.ids].sort()).toEqual(['m2', 'm3']);
  });

  it('should emit a repeated id only once', () => {
    const result = advanceCursor({ timestamp: 0, ids: new Set() }, [textMessage('m1', 10, 'a'), textMessage('m1', 10, 'a')], 0);

    expect(result.fresh).toHaveLength(1);
  });

  it('should keep the cursor when nothing is new', () => {
    const cursor = { timestamp: 200, ids: new Set(['m2']) };

    expect(advanceCursor(cursor, [textMessage('m2', 200, 'a')], 0).cursor).toBe(cursor);
  });
});

describe('ContactMonitor', () => {
  let surface: FakeSurface;
  let contacts: ContactDirectory;
  let clock: number;
  let media: MediaResolver;

  function createMonitor(overrides: Partial<ContactMonitorOptions> = {}): ContactMonitor {
    return new ContactMonitor({
      surface,
      contacts,
      media,
      pollIntervalMs: 1_000,
      echoWindowMs: 30_000,
      degradedAfterFailures: 3,
      onMessage: () => {},
      now: () => clock,
      ...overrides,
    });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    surface = new FakeSurface();
    contacts = new ContactDirectory([{ nickname: 'Alice', userId: '12345' }]);
    clock = 1_000;
    media = {
      resolve: async (reference: string) => `/cache/${reference.replace(/^\w+:\/\//, '')}`,
      release: vi.fn(async () => {}),
    };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should emit only messages that arrive after the first poll', async () => {
    const onMessage = vi.fn();
    const monitor = createMonitor({ onMessage });
    surface.show('Alice', textMessage('m1', 500, 'backlog'));

    expect(await monitor.poll()).toEqual([]);

    surface.show('Alice', textMessage('m2', 1_200, 'hello'));
    clock = 1_300;
    const emitted = await monitor.poll();

    expect(emitted).toEqual([
      { contact: { nickname: 'Alice', userId: '12345' }, messageId: 'm2', timestamp: 1_200, kind: 'text', text: 'hello', path: undefined, fileName: undefined },
    ]);
    expect(Object.isFrozen(emitted[0])).toBe(true);
    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(await monitor.poll()).toEqual([]);
  });

  it('should skip own messages and system notices', async () => {
    const monitor = createMonitor();
    await monitor.poll();

    surface.show(
      'Alice',
      textMessage('m2', 1_100, 'from me', { fromSelf: true }),
      textMessage('m3', 1_100, 'Alice recalled a message', { system: true }),
      textMessage('m4', 1_200, 'real'),
    );

    expect((await monitor.poll()).map((m) => m.messageId)).toEqual(['m4']);
  });

  it('should not re-emit text it just sent to the contact', async () => {
    const monitor = createMonitor();
    monitor.start();
    await monitor.poll();

    await monitor.send({ nickname: 'Alice', userId: '12345' }, [{ type: 'text', data: { text: 'pong' } }]);
    surface.show('Alice', textMessage('e1', 1_100, 'pong'), textMessage('m2', 1_100, 'pong'));

    expect((await monitor.poll()).map((m) => m.messageId)).toEqual(['m2']);
    await monitor.stop();
  });

  it('should forget sent text once the echo window has passed', async () => {
    const monitor = createMonitor({ echoWindowMs: 5_000 });
    monitor.start();
    await monitor.poll();

    await monitor.send({ nickname: 'Alice' }, [{ type: 'text', data: { text: 'pong' } }]);
    clock = 10_000;
    surface.show('Alice', textMessage('m2', 9_000, 'pong'));

    expect((await monitor.poll()).map((m) => m.messageId)).toEqual(['m2']);
    await monitor.stop();
  });

  it('should keep the remembered texts bounded while the contact stays silent', async () => {
    const monitor = createMonitor();
    monitor.start();
    const alice = { nickname: 'Alice', userId: '12345' };

    for (let i = 0; i < 60; i++) {
      await monitor.send(alice, [{ type: 'text', data: { text: `reply ${i}` } }]);
    }
    expect(monitor.echoCount('Alice')).toBe(50);

    clock = 40_000;
    await monitor.send(alice, [{ type: 'text', data: { text: 'later' } }]);
    expect(monitor.echoCount('Alice')).toBe(1);
    await monitor.stop();
  });

  it('should become degraded after three failing cycles and recover on a clean one', async () => {
    const onError = vi.fn();
    const monitor = createMonitor({ onError });
    surface.failReads = true;

    await monitor.poll();
    await monitor.poll();
    expect(monitor.degraded).toBe(false);
    await monitor.poll();

    expect(monitor.consecutiveFailures).toBe(3);
    expect(monitor.degraded).toBe(true);
    expect(onError).toHaveBeenCalledTimes(3);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(TransientIOError);

    surface.failReads = false;
    await monitor.poll();

    expect(monitor.degraded).toBe(false);
    expect(monitor.consecutiveFailures).toBe(0);
    expect(surface.attachCalls).toBe(2);
  });

  it('should count a failed attach as a failed cycle', async () => {
    const monitor = createMonitor();
    surface.failAttach = true;

    expect(await monitor.poll()).toEqual([]);
    expect(monitor.consecutiveFailures).toBe(1);
  });

  it('should drop the cursor of a removed contact', async () => {
    contacts.add({ nickname: 'Bob' });
    const monitor = createMonitor();
    await monitor.poll();
    expect(monitor.trackedContacts).toEqual(['Alice', 'Bob']);

    contacts.remove('Bob');
    await monitor.poll();

    expect(monitor.trackedContacts).toEqual(['Alice']);
  });

  it('should send segments in order and resolve media first', async () => {
    const monitor = createMonitor();
    monitor.start();

    const result = await monitor.send({ nickname: 'Alice' }, [
      { type: 'text', data: { text: 'look' } },
      { type: 'image', data: { file: 'file:///tmp/cat.png' } },
      { type: 'file', data: { file: 'base64://aGk=', name: 'hi.txt' } },
    ]);

    expect(result).toEqual({ ok: true, delivered: 3 });
    expect(surface.sent).toEqual([
      { nickname: 'Alice', kind: 'text', value: 'look' },
      { nickname: 'Alice', kind: 'file', value: '/cache//tmp/cat.png' },
      { nickname: 'Alice', kind: 'file', value: '/cache/aGk=' },
    ]);
    expect(media.release).toHaveBeenCalledTimes(2);
    expect(media.release).toHaveBeenLastCalledWith('/cache/aGk=');
    await monitor.stop();
  });

  it('should release a resolved file even when sending it fails', async () => {
    const monitor = createMonitor();
    monitor.start();
    surface.failSendOf = '/cache/aGk=';

    const result = await monitor.send({ nickname: 'Alice' }, [{ type: 'file', data: { file: 'base64://aGk=' } }]);

    expect(result).toEqual({ ok: false, delivered: 0, error: 'file dialog failed' });
    expect(media.release).toHaveBeenCalledWith('/cache/aGk=');
    await monitor.stop();
  });

  it('should stop at the first failing segment', async () => {
    const monitor = createMonitor();
    monitor.start();
    surface.failSendOf = 'two';

    const result = await monitor.send({ nickname: 'Alice' }, [
      { type: 'text', data: { text: 'one' } },
      { type: 'text', data: { text: 'two' } },
      { type: 'text', data: { text: 'three' } },
    ]);

    expect(result).toEqual({ ok: false, delivered: 1, error: 'send button missing' });
    expect(surface.sent.map((s) => s.value)).toEqual(['one']);
    await monitor.stop();
  });

  it('should refuse to send while stopped', async () => {
    const monitor = createMonitor();

    expect(await monitor.send({ nickname: 'Alice' }, [{ type: 'text', data: { text: 'hi' } }])).toEqual({
      ok: false,
      delivered: 0,
      error: 'Contact monitor is not running',
    });
  });

  it('should poll on its interval without overlapping and detach on stop', async () => {
    const monitor = createMonitor();
    const read = vi.spyOn(surface, 'readMessages');

    monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(read).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(read).toHaveBeenCalledTimes(3);

    await monitor.stop();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(read).toHaveBeenCalledTimes(3);
    expect(surface.detachCalls).toBe(1);
    expect(monitor.running).toBe(false);
  });
});
