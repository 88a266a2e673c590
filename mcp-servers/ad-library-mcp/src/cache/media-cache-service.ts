import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import { deriveAnalysisFields, type AnalysisPayload } from './analysis-fields.js';
import { BlobStore } from './blob-store.js';
import { InvalidInputError, StorageWriteError, describeError } from './errors.js';
import { MetadataStore } from './metadata-store.js';
import type {
  CacheEntry,
  CacheSearchFilters,
  CacheStats,
  EvictionReport,
  MediaFacts,
  MediaKind,
  PutMediaInput,
} from './types.js';
import { assertValidUrl, identifyUrl } from './url-identity.js';
import { WriteLock } from './write-lock.js';

export const METADATA_DB_FILENAME = 'media_cache.db';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MediaCacheOpenOptions {
  rootDir: string;
  now?: () => Date;
}

function latest(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

function validatePutInput(input: PutMediaInput): void {
  assertValidUrl(input.url);
  if (!Buffer.isBuffer(input.bytes)) {
    throw new InvalidInputError(`Media bytes for ${input.url} must be a Buffer`);
  }
  if (input.mediaKind !== 'image' && input.mediaKind !== 'video') {
    throw new InvalidInputError(`Unsupported media kind: ${String(input.mediaKind)}`);
  }
}

/**
 * Owns cached media bytes and their metadata rows. Entries are keyed by the
 * hash of their source URL; a row whose file has disappeared is purged the
 * next time it is read.
 */
export class MediaCacheService {
  private readonly blobStore: BlobStore;
  private readonly metadataStore: MetadataStore;
  private readonly now: () => Date;
  private readonly writeLock = new WriteLock();

  constructor(blobStore: BlobStore, metadataStore: MetadataStore, now: () => Date = () => new Date()) {
    this.blobStore = blobStore;
    this.metadataStore = metadataStore;
    this.now = now;
  }

  static open(options: MediaCacheOpenOptions): MediaCacheService {
    mkdirSync(options.rootDir, { recursive: true });
    const metadataStore = new MetadataStore(path.join(options.rootDir, METADATA_DB_FILENAME));
    logger.info('Media cache initialized', { rootDir: options.rootDir });
    return new MediaCacheService(new BlobStore(options.rootDir), metadataStore, options.now);
  }

  async getCached(url: string, kindFilter?: MediaKind): Promise<CacheEntry | null> {
    const key = identifyUrl(url);
    const entry = this.metadataStore.get(key, kindFilter);
    if (!entry) {
      return null;
    }

    if (!(await this.blobStore.exists(entry.storagePath))) {
      this.metadataStore.delete(key, entry.storagePath);
      logger.warn('Cached file missing, removed from metadata', { key, storagePath: entry.storagePath });
      return null;
    }

    const accessedAt = this.now();
    this.metadataStore.touch(key, accessedAt);
    entry.lastAccessedAt = latest(entry.lastAccessedAt, accessedAt);
    logger.debug('Media cache hit', { url });
    return entry;
  }

  async getCachedBatch(urls: string[], kindFilter?: MediaKind): Promise<Map<string, CacheEntry | null>> {
    const keyByUrl = new Map<string, string>();
    for (const url of urls) {
      keyByUrl.set(url, identifyUrl(url));
    }

    const rows = this.metadataStore.getBatch([...keyByUrl.values()], kindFilter);
    const found = [...rows.values()].filter((entry): entry is CacheEntry => entry !== null);
    const presence = await Promise.all(found.map((entry) => this.blobStore.exists(entry.storagePath)));

    const stale: CacheEntry[] = [];
    const hitKeys: string[] = [];
    found.forEach((entry, index) => {
      if (presence[index]) {
        hitKeys.push(entry.key);
      } else {
        stale.push(entry);
        rows.set(entry.key, null);
      }
    });

    if (stale.length > 0) {
      this.metadataStore.deleteMany(stale);
      logger.warn('Cached files missing, removed from metadata', { keys: stale.map((entry) => entry.key) });
    }

    const accessedAt = this.now();
    if (hitKeys.length > 0) {
      this.metadataStore.touchMany(hitKeys, accessedAt);
    }

    const result = new Map<string, CacheEntry | null>();
    for (const [url, key] of keyByUrl) {
      const entry = rows.get(key) ?? null;
      if (entry) {
        entry.lastAccessedAt = latest(entry.lastAccessedAt, accessedAt);
      }
      result.set(url, entry);
    }

    logger.info(`Batch cache lookup: ${hitKeys.length}/${keyByUrl.size} cache hits`);
    return result;
  }

  /**
   * Stores bytes and metadata for one URL. Replacing an entry whose file had
   * another extension removes the old file once the new row is written.
   */
  async put(input: PutMediaInput): Promise<string> {
    validatePutInput(input);
    const key = identifyUrl(input.url);

    return this.writeLock.run(async () => {
      const previous = this.metadataStore.get(key);
      const storagePath = await this.blobStore.write(key, input.mediaKind, input.contentType, input.bytes);
      const entry = this.buildEntry(input, key, storagePath, this.now());

      try {
        this.metadataStore.put(entry);
      } catch (error) {
        throw new StorageWriteError(`Failed to write cache metadata for ${input.url}: ${describeError(error)}`, {
          path: storagePath,
          cause: error,
        });
      }

      if (previous && previous.storagePath !== storagePath) {
        await this.removeBlob(previous.storagePath);
      }

      logger.info(`Cached ${input.mediaKind}`, { url: input.url, storagePath, sizeBytes: entry.sizeBytes });
      return storagePath;
    });
  }

  /**
   * Writes every blob before any metadata, so a failed blob write aborts the
   * batch without leaving rows that point at missing files. When a URL
   * appears more than once the last input wins and the earlier ones are not
   * written. The result has one storage path per input.
   */
  async putBatch(inputs: PutMediaInput[]): Promise<string[]> {
    if (inputs.length === 0) return [];
    inputs.forEach(validatePutInput);

    const keys = inputs.map((input) => identifyUrl(input.url));
    const finalIndex = keys.map((key) => keys.lastIndexOf(key));
    const finalPositions = keys.map((_, index) => index).filter((index) => finalIndex[index] === index);

    return this.writeLock.run(async () => {
      const previous = this.metadataStore.getBatch(finalPositions.map((index) => keys[index]));

      const storagePaths: string[] = [];
      try {
        for (const index of finalPositions) {
          const input = inputs[index];
          storagePaths[index] = await this.blobStore.write(keys[index], input.mediaKind, input.contentType, input.bytes);
        }
      } catch (error) {
        await this.discardUnreferenced(finalPositions, keys, storagePaths, previous);
        throw error;
      }

      const writtenAt = this.now();
      const entries = finalPositions.map((index) =>
        this.buildEntry(inputs[index], keys[index], storagePaths[index], writtenAt)
      );
      const currentPaths = new Set(entries.map((entry) => entry.storagePath));

      let written: string[];
      try {
        written = this.metadataStore.putBatch(entries);
      } catch (error) {
        throw new StorageWriteError(`Failed to write cache metadata batch: ${describeError(error)}`, { cause: error });
      }
      if (written.length < entries.length) {
        logger.warn('Some cache metadata rows were not written', {
          attempted: entries.length,
          written: written.length,
        });
      }

      const writtenKeys = new Set(written);
      for (const entry of previous.values()) {
        if (entry && writtenKeys.has(entry.key) && !currentPaths.has(entry.storagePath)) {
          await this.removeBlob(entry.storagePath);
        }
      }

      logger.info(`Batch cached ${entries.length} media files`, { inputs: inputs.length });
      return finalIndex.map((index) => storagePaths[index]);
    });
  }

  // Blobs from a failed batch that no existing row points at.
  private async discardUnreferenced(
    positions: number[],
    keys: string[],
    storagePaths: string[],
    previous: Map<string, CacheEntry | null>
  ): Promise<void> {
    for (const index of positions) {
      const written = storagePaths[index];
      if (written !== undefined && previous.get(keys[index])?.storagePath !== written) {
        await this.removeBlob(written);
      }
    }
  }

  /** Returns false, creating nothing, when the URL has no cache entry. */
  async attachAnalysis(url: string, analysis: AnalysisPayload, facts: MediaFacts = {}): Promise<boolean> {
    const key = identifyUrl(url);
    const updated = this.metadataStore.updateAnalysis(key, analysis, this.now(), facts);
    if (!updated) {
      logger.warn('Cannot attach analysis to uncached media', { url });
      return false;
    }
    logger.info('Updated analysis results', { url });
    return true;
  }

  async readBytes(entry: CacheEntry): Promise<Buffer> {
    return this.blobStore.read(entry.storagePath);
  }

  async search(filters: CacheSearchFilters = {}): Promise<CacheEntry[]> {
    return this.metadataStore.search(filters);
  }

  async stats(): Promise<CacheStats> {
    return this.metadataStore.stats();
  }

  /** Evicts by creation time; last access does not extend an entry's life. */
  async evictOlderThan(maxAgeDays: number): Promise<EvictionReport> {
    if (!Number.isFinite(maxAgeDays) || maxAgeDays < 0) {
      throw new InvalidInputError(`maxAgeDays must be a non-negative number, got ${maxAgeDays}`);
    }

    return this.writeLock.run(async () => {
      const cutoff = new Date(this.now().getTime() - maxAgeDays * DAY_MS);
      const expired = this.metadataStore.listOlderThan(cutoff);

      const report: EvictionReport = {
        maxAgeDays,
        cutoff,
        filesRemoved: 0,
        bytesFreed: 0,
        perKind: {
          image: { count: 0, bytes: 0 },
          video: { count: 0, bytes: 0 },
        },
      };

      for (const record of expired) {
        await this.removeBlob(record.storagePath);
        report.filesRemoved += 1;
        report.bytesFreed += record.sizeBytes;
        report.perKind[record.mediaKind].count += 1;
        report.perKind[record.mediaKind].bytes += record.sizeBytes;
      }
      this.metadataStore.deleteMany(expired);

      logger.info(
        `Cleanup completed: removed ${report.perKind.image.count} images and ${report.perKind.video.count} videos`,
        { maxAgeDays, bytesFreed: report.bytesFreed }
      );
      return report;
    });
  }

  close(): void {
    this.metadataStore.close();
  }

  private buildEntry(input: PutMediaInput, key: string, storagePath: string, at: Date): CacheEntry {
    const entry: CacheEntry = {
      key,
      originalUrl: input.url,
      storagePath,
      mediaKind: input.mediaKind,
      contentType: input.contentType,
      sizeBytes: input.bytes.length,
      createdAt: at,
      lastAccessedAt: at,
      ...deriveAnalysisFields(input.analysis),
    };
    if (input.brandName) entry.brandName = input.brandName;
    if (input.adId) entry.adId = input.adId;
    if (input.analysis) {
      entry.analysis = input.analysis;
      entry.analysisCachedAt = at;
    }
    if (input.durationSeconds !== undefined) entry.durationSeconds = input.durationSeconds;
    if (input.hasAudio !== undefined) entry.hasAudio = input.hasAudio;
    return entry;
  }

  private async removeBlob(storagePath: string): Promise<void> {
    try {
      await this.blobStore.delete(storagePath);
    } catch (error) {
      logger.warn('Failed to delete cached file', { storagePath, message: describeError(error) });
    }
  }
}
