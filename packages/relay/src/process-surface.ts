// Process Surface - Chat surface backed by a helper executable
//
// The helper drives the desktop client and speaks newline-delimited JSON on
// stdio. Each request line is `{ id, method, params }`; each response line is
// `{ id, ok, result?, error? }`. Anything else on stdout is ignored.

import { spawn } from 'node:child_process';
import { basename } from 'node:path';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { z } from 'zod';
import { TransientIOError, describeError } from './errors.js';
import type { Logger } from './log.js';
import { silentLogger } from './log.js';
import type { ChatSurface, SurfaceMessage } from './surface.js';

export interface HelperProcess {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable | null;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type HelperSpawner = (command: string, args: string[]) => HelperProcess;

export interface ProcessSurfaceOptions {
  command: string;
  args?: string[];
  requestTimeoutMs: number;
  spawner?: HelperSpawner;
  logger?: Logger;
}

const ResponseSchema = z.object({
  id: z.number().int(),
  ok: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

const SurfaceMessageSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  timestamp: z.number().nonnegative(),
  kind: z.enum(['text', 'image', 'file']),
  text: z.string().optional(),
  path: z.string().optional(),
  fileName: z.string().optional(),
  fromSelf: z.boolean().optional(),
  system: z.boolean().optional(),
});

const MessageListSchema = z.array(SurfaceMessageSchema);

type Method = 'attach' | 'detach' | 'readMessages' | 'sendText' | 'sendFile';

interface PendingRequest {
  method: Method;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const defaultSpawner: HelperSpawner = (command, args) =>
  spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

export class ProcessSurface implements ChatSurface {
  readonly name: string;
  private options: ProcessSurfaceOptions;
  private logger: Logger;
  private spawner: HelperSpawner;
  private child: HelperProcess | null = null;
  private lines: Interface | null = null;
  private pending = new Map<number, PendingRequest>();
  private requestSeq = 0;

  constructor(options: ProcessSurfaceOptions) {
    this.options = options;
    this.name = basename(options.command);
    this.logger = options.logger ?? silentLogger;
    this.spawner = options.spawner ?? defaultSpawner;
  }

  get alive(): boolean {
    return this.child !== null;
  }

  async attach(): Promise<void> {
    this.ensureProcess();
    await this.request('attach', {});
  }

  async detach(): Promise<void> {
    if (!this.child) return;
    try {
      await this.request('detach', {});
    } finally {
      this.shutdown();
    }
  }

  async readMessages(nickname: string): Promise<SurfaceMessage[]> {
    const result = await this.request('readMessages', { nickname });
    const parsed = MessageListSchema.safeParse(result);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new TransientIOError(
        `Helper returned malformed messages for "${nickname}": ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
    }
    return parsed.data;
  }

  async sendText(nickname: string, text: string): Promise<void> {
    await this.request('sendText', { nickname, text });
  }

  async sendFile(nickname: string, path: string): Promise<void> {
    await this.request('sendFile', { nickname, path });
  }

  private ensureProcess(): void {
    if (this.child) return;

    const { command, args = [] } = this.options;
    let child: HelperProcess;
    try {
      child = this.spawner(command, args);
    } catch (err) {
      throw new TransientIOError(`Cannot start ${command}: ${describeError(err)}`, err);
    }
    this.child = child;
    this.logger.info(`[surface] Started ${this.name}`);

    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    lines.on('line', (line) => this.handleLine(line));
    this.lines = lines;

    child.stderr?.on('data', (chunk: Buffer) => {
      const text = chunk.toString('utf8').trim();
      if (text) this.logger.debug(`[surface] ${text}`);
    });

    child.on('exit', (code, signal) => {
      if (this.child !== child) return;
      this.logger.warn(`[surface] ${this.name} exited (code=${code}, signal=${signal})`);
      this.release(new TransientIOError(`${this.name} exited`));
    });

    child.on('error', (err) => {
      if (this.child !== child) return;
      this.logger.error(`[surface] ${this.name} failed: ${err.message}`);
      this.release(new TransientIOError(`${this.name} failed: ${err.message}`, err));
    });
  }

  private request(method: Method, params: Record<string, unknown>): Promise<unknown> {
    const child = this.child;
    if (!child) {
      return Promise.reject(new TransientIOError(`${this.name} is not running`));
    }

    const id = ++this.requestSeq;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new TransientIOError(`${method} timed out after ${this.options.requestTimeoutMs}ms`));
      }, this.options.requestTimeoutMs);

      this.pending.set(id, { method, resolve, reject, timer });
      child.stdin.write(`${JSON.stringify({ id, method, params })}\n`, (err) => {
        if (err) this.settle(id, new TransientIOError(`Cannot write ${method} request: ${err.message}`, err));
      });
    });
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      this.logger.debug(`[surface] Ignoring non-JSON output: ${trimmed.slice(0, 200)}`);
      return;
    }

    const parsed = ResponseSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`[surface] Ignoring malformed response: ${trimmed.slice(0, 200)}`);
      return;
    }

    const { id, ok, result, error } = parsed.data;
    if (!this.pending.has(id)) {
      this.logger.debug(`[surface] Response for unknown request ${id}`);
      return;
    }
    if (ok) this.settle(id, null, result);
    else this.settle(id, new TransientIOError(error ?? 'Helper reported an unspecified error'));
  }

  private settle(id: number, error: Error | null, result?: unknown): void {
    const entry = this.pending.get(id);
    if (!entry) return;
    this.pending.delete(id);
    clearTimeout(entry.timer);
    if (error) entry.reject(error);
    else entry.resolve(result);
  }

  /** Forgets the current process and fails every outstanding request. */
  private release(error: Error): void {
    this.child = null;
    this.lines?.close();
    this.lines = null;
    for (const id of [...this.pending.keys()]) {
      this.settle(id, error);
    }
  }

  private shutdown(): void {
    const child = this.child;
    if (!child) return;
    this.release(new TransientIOError(`${this.name} detached`));
    child.stdin.end();
    child.kill('SIGTERM');
    this.logger.info(`[surface] Stopped ${this.name}`);
  }
}
