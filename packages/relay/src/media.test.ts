import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MappingError, TransientIOError } from './errors.js';
import { MediaStore } from './media.js';

describe('MediaStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'relay-media-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function createStore(fetchImpl?: typeof fetch): MediaStore {
    return new MediaStore({ cacheDir: join(dir, 'cache'), fetchTimeoutMs: 1_000, fetchImpl });
  }

  it('should write base64 payloads into the cache under the given name', async () => {
    const path = await createStore().resolve('base64://aGVsbG8=', 'note.txt');

    expect(path.startsWith(join(dir, 'cache'))).toBe(true);
    expect(basename(path)).toMatch(/^[0-9a-f-]{36}-note\.txt$/);
    expect(readFileSync(path, 'utf-8')).toBe('hello');
  });

  it('should reject an empty base64 payload', async () => {
    await expect(createStore().resolve('base64://')).rejects.toBeInstanceOf(MappingError);
  });

  it('should download http references', async () => {
    const fetchImpl = vi.fn(async () => new Response('image-bytes'));

    const path = await createStore(fetchImpl).resolve('https://img.test/pics/cat.png');

    expect(fetchImpl).toHaveBeenCalledWith('https://img.test/pics/cat.png', expect.objectContaining({ signal: expect.any(AbortSignal) }));
    expect(basename(path)).toMatch(/-cat\.png$/);
    expect(readFileSync(path, 'utf-8')).toBe('image-bytes');
  });

  it('should treat a failed download as transient', async () => {
    const notFound = vi.fn(async () => new Response('', { status: 404 }));
    const offline = vi.fn(async () => {
      throw new Error('getaddrinfo ENOTFOUND img.test');
    });

    await expect(createStore(notFound).resolve('https://img.test/a.png')).rejects.toThrow('Failed to fetch media https://img.test/a.png: HTTP 404');
    await expect(createStore(offline).resolve('https://img.test/a.png')).rejects.toBeInstanceOf(TransientIOError);
  });

  it('should pass existing local files through as paths', async () => {
    const local = join(dir, 'photo.jpg');
    writeFileSync(local, 'jpg');

    await expect(createStore().resolve(local)).resolves.toBe(local);
    await expect(createStore().resolve(pathToFileURL(local).href)).resolves.toBe(local);
  });

  it('should delete cached files on release and keep caller files', async () => {
    const store = createStore();
    const cached = await store.resolve('base64://aGVsbG8=', 'note.txt');
    const local = join(dir, 'photo.jpg');
    writeFileSync(local, 'jpg');

    await store.release(cached);
    await store.release(await store.resolve(local));

    expect(existsSync(cached)).toBe(false);
    expect(existsSync(local)).toBe(true);
  });

  it('should reject local files that do not exist', async () => {
    await expect(createStore().resolve(join(dir, 'missing.png'))).rejects.toThrow(MappingError);
  });
});
