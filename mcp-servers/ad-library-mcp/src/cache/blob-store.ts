import { promises as fs } from 'node:fs';
import path from 'node:path';
import { StorageWriteError, describeError } from './errors.js';
import type { MediaKind } from './types.js';

const IMAGE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

const VIDEO_EXTENSIONS: Record<string, string> = {
  'video/mp4': '.mp4',
  'video/quicktime': '.mov',
  'video/webm': '.webm',
  'video/x-msvideo': '.avi',
  'video/3gpp': '.3gp',
};

const DEFAULT_EXTENSION: Record<MediaKind, string> = {
  image: '.jpg',
  video: '.mp4',
};

const KIND_DIRECTORY: Record<MediaKind, string> = {
  image: 'images',
  video: 'videos',
};

export function normalizeContentType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

export function extensionFor(mediaKind: MediaKind, contentType: string): string {
  const table = mediaKind === 'video' ? VIDEO_EXTENSIONS : IMAGE_EXTENSIONS;
  return table[normalizeContentType(contentType)] ?? DEFAULT_EXTENSION[mediaKind];
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class BlobStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  directoryFor(mediaKind: MediaKind): string {
    return path.join(this.rootDir, KIND_DIRECTORY[mediaKind]);
  }

  pathFor(key: string, mediaKind: MediaKind, contentType: string): string {
    return path.join(this.directoryFor(mediaKind), `${key}${extensionFor(mediaKind, contentType)}`);
  }

  async write(key: string, mediaKind: MediaKind, contentType: string, bytes: Buffer): Promise<string> {
    const target = this.pathFor(key, mediaKind, contentType);
    try {
      await fs.mkdir(this.directoryFor(mediaKind), { recursive: true });
      await fs.writeFile(target, bytes);
    } catch (error) {
      throw new StorageWriteError(`Failed to write ${mediaKind} blob ${target}: ${describeError(error)}`, {
        path: target,
        cause: error,
      });
    }
    return target;
  }

  async read(filePath: string): Promise<Buffer> {
    return fs.readFile(filePath);
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }

  /** Returns true when a file was removed, false when it was already gone. */
  async delete(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }
}
