// Test doubles for the chat surface and the socket layer

import { DEFAULT_CONFIG, type RelayConfig } from './config.js';
import type { ChatSurface, SurfaceMessage } from './surface.js';
import type { SocketFactory, SocketHandlers, TransportSocket } from './ws-client.js';

export interface SentItem {
  nickname: string;
  kind: 'text' | 'file';
  value: string;
}

export class FakeSurface implements ChatSurface {
  readonly name = 'fake surface';
  readonly sent: SentItem[] = [];
  attachCalls = 0;
  detachCalls = 0;
  failAttach = false;
  failReads = false;
  /** Sends whose text or path equals this value throw. */
  failSendOf: string | null = null;
  private visible = new Map<string, SurfaceMessage[]>();

  show(nickname: string, ...messages: SurfaceMessage[]): void {
    this.visible.set(nickname, [...(this.visible.get(nickname) ?? []), ...messages]);
  }

  async attach(): Promise<void> {
    this.attachCalls++;
    if (this.failAttach) throw new Error('chat window not found');
  }

  async detach(): Promise<void> {
    this.detachCalls++;
  }

  async readMessages(nickname: string): Promise<SurfaceMessage[]> {
    if (this.failReads) throw new Error(`cannot open chat with ${nickname}`);
    return [...(this.visible.get(nickname) ?? [])];
  }

  async sendText(nickname: string, text: string): Promise<void> {
    if (this.failSendOf === text) throw new Error('send button missing');
    this.sent.push({ nickname, kind: 'text', value: text });
  }

  async sendFile(nickname: string, path: string): Promise<void> {
    if (this.failSendOf === path) throw new Error('file dialog failed');
    this.sent.push({ nickname, kind: 'file', value: path });
  }
}

export function textMessage(id: string, timestamp: number, text: string, extra: Partial<SurfaceMessage> = {}): SurfaceMessage {
  return { id, timestamp, kind: 'text', text, ...extra };
}

export class FakeSocket implements TransportSocket {
  readonly sent: string[] = [];
  pings = 0;
  closed: { code?: number; reason?: string } | null = null;
  terminated = false;
  open = true;
  /** Reports the close back through onClose, as a cooperative peer would. */
  autoClose = true;

  constructor(
    readonly url: string,
    readonly headers: Record<string, string>,
    readonly handlers: SocketHandlers,
  ) {}

  isOpen(): boolean {
    return this.open;
  }

  send(data: string): void {
    this.sent.push(data);
  }

  ping(): void {
    this.pings++;
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
    this.open = false;
    if (this.autoClose) this.handlers.onClose(code ?? 1005, reason ?? '');
  }

  terminate(): void {
    this.terminated = true;
    this.open = false;
  }

  /** Parsed frames written so far. */
  frames(): Array<Record<string, unknown>> {
    return this.sent.map((data) => {
      const frame: Record<string, unknown> = JSON.parse(data);
      return frame;
    });
  }
}

export function createSocketFactory(): { factory: SocketFactory; sockets: FakeSocket[] } {
  const sockets: FakeSocket[] = [];
  const factory: SocketFactory = (url, headers, handlers) => {
    const socket = new FakeSocket(url, headers, handlers);
    sockets.push(socket);
    return socket;
  };
  return { factory, sockets };
}

export function makeConfig(overrides: Partial<RelayConfig> = {}): RelayConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.transport.endpoint = { url: 'ws://bot.test/onebot', accessToken: 'test-secret' };
  config.media.cacheDir = 'cache/test-media';
  config.stopGraceMs = 200;
  return { ...config, ...overrides };
}
