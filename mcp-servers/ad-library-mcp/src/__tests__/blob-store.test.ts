import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BlobStore, extensionFor, normalizeContentType } from '../cache/blob-store.js';
import { StorageWriteError } from '../cache/errors.js';

describe('BlobStore', () => {
  let rootDir: string;
  let store: BlobStore;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'blob-store-'));
    store = new BlobStore(rootDir);
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('maps content types to extensions with per-kind defaults', () => {
    expect(extensionFor('image', 'image/png')).toBe('.png');
    expect(extensionFor('image', 'IMAGE/WEBP; charset=binary')).toBe('.webp');
    expect(extensionFor('image', 'application/octet-stream')).toBe('.jpg');
    expect(extensionFor('video', 'video/quicktime')).toBe('.mov');
    expect(extensionFor('video', 'video/3gpp')).toBe('.3gp');
    expect(extensionFor('video', '')).toBe('.mp4');
  });

  it('normalises content types', () => {
    expect(normalizeContentType(' Video/MP4 ; codecs="avc1"')).toBe('video/mp4');
  });

  it('places blobs under a per-kind directory named by key', () => {
    expect(store.pathFor('abc', 'image', 'image/gif')).toBe(path.join(rootDir, 'images', 'abc.gif'));
    expect(store.pathFor('abc', 'video', 'video/webm')).toBe(path.join(rootDir, 'videos', 'abc.webm'));
  });

  it('writes, reads and deletes blobs', async () => {
    const bytes = Buffer.from([1, 2, 3, 4]);
    const written = await store.write('k1', 'image', 'image/png', bytes);

    expect(written).toBe(path.join(rootDir, 'images', 'k1.png'));
    expect(await store.exists(written)).toBe(true);
    expect(await store.read(written)).toEqual(bytes);

    expect(await store.delete(written)).toBe(true);
    expect(await store.exists(written)).toBe(false);
    expect(await store.delete(written)).toBe(false);
  });

  it('overwrites an existing blob for the same key', async () => {
    await store.write('k1', 'video', 'video/mp4', Buffer.from('first'));
    const written = await store.write('k1', 'video', 'video/mp4', Buffer.from('second'));
    expect((await store.read(written)).toString()).toBe('second');
  });

  it('reports directories as missing blobs', async () => {
    await fs.mkdir(path.join(rootDir, 'images'), { recursive: true });
    expect(await store.exists(path.join(rootDir, 'images'))).toBe(false);
  });

  it('wraps write failures in StorageWriteError', async () => {
    const blockedRoot = path.join(rootDir, 'not-a-directory');
    await fs.writeFile(blockedRoot, 'file in the way');
    const blocked = new BlobStore(blockedRoot);

    await expect(blocked.write('k1', 'image', 'image/jpeg', Buffer.from('x'))).rejects.toBeInstanceOf(
      StorageWriteError
    );
  });
});
