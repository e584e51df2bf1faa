// Media Store - Resolves OneBot media references to local files for the surface

import { randomUUID } from 'node:crypto';
import { access, mkdir, rm, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { MappingError, TransientIOError, describeError } from './errors.js';
import type { Logger } from './log.js';
import { silentLogger } from './log.js';

export interface MediaStoreOptions {
  cacheDir: string;
  fetchTimeoutMs: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export interface MediaResolver {
  resolve(reference: string, nameHint?: string): Promise<string>;
  /** Called once the surface is done with a resolved path. */
  release(path: string): Promise<void>;
}

const BASE64_PREFIX = 'base64://';

export class MediaStore implements MediaResolver {
  private options: MediaStoreOptions;
  private fetchImpl: typeof fetch;
  private logger: Logger;
  /** Files this store wrote into the cache and has not removed yet. */
  private written = new Set<string>();

  constructor(options: MediaStoreOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Returns a local path for a segment's `file` reference. Accepts plain
   * paths, file:// URLs, base64:// payloads and http(s) URLs.
   */
  async resolve(reference: string, nameHint?: string): Promise<string> {
    if (reference.startsWith(BASE64_PREFIX)) {
      const bytes = Buffer.from(reference.slice(BASE64_PREFIX.length), 'base64');
      if (bytes.length === 0) {
        throw new MappingError('Empty base64 media payload');
      }
      return this.store(bytes, nameHint);
    }

    if (/^https?:\/\//i.test(reference)) {
      return this.download(reference, nameHint);
    }

    const path = reference.startsWith('file://') ? fileURLToPath(reference) : resolve(reference);
    try {
      await access(path);
    } catch {
      throw new MappingError(`Media file not found: ${path}`);
    }
    return path;
  }

  /** Deletes a cached download or decoded payload. Caller-owned paths are left alone. */
  async release(path: string): Promise<void> {
    if (!this.written.delete(path)) return;
    try {
      await rm(path, { force: true });
    } catch (err) {
      this.logger.warn(`[media] Cannot remove cached file ${path}: ${describeError(err)}`);
    }
  }

  private async download(url: string, nameHint?: string): Promise<string> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.options.fetchTimeoutMs) });
    } catch (err) {
      throw new TransientIOError(`Failed to fetch media ${url}: ${describeError(err)}`, err);
    }
    if (!res.ok) {
      throw new TransientIOError(`Failed to fetch media ${url}: HTTP ${res.status}`);
    }
    const bytes = Buffer.from(await res.arrayBuffer());
    const urlName = basename(new URL(url).pathname);
    this.logger.debug(`[media] Downloaded ${bytes.length} bytes from ${url}`);
    return this.store(bytes, nameHint ?? (urlName || undefined));
  }

  private async store(bytes: Buffer, nameHint?: string): Promise<string> {
    await mkdir(this.options.cacheDir, { recursive: true });
    const fileName = nameHint ? `${randomUUID()}-${basename(nameHint)}` : `${randomUUID()}.bin`;
    const path = resolve(join(this.options.cacheDir, fileName));
    await writeFile(path, bytes);
    this.written.add(path);
    return path;
  }
}
