import type { AnalysisPayload } from '../cache/analysis-fields.js';
import { normalizeContentType } from '../cache/blob-store.js';
import { describeError } from '../cache/errors.js';
import type { MediaCacheService } from '../cache/media-cache-service.js';
import type { CacheEntry, MediaKind, PutMediaInput } from '../cache/types.js';
import { assertValidUrl } from '../cache/url-identity.js';
import { videoFacts } from '../clients/analysis-response.js';
import { InvalidMediaError } from '../clients/errors.js';
import type { MediaAnalyzer } from '../clients/media-analysis-client.js';
import { classifyContentType, type FetchedMedia, type MediaFetcher } from '../clients/media-fetcher.js';
import { logger } from '../utils/logger.js';

export interface AnalysisTarget {
  url: string;
  brandName?: string;
  adId?: string;
}

export type AnalysisStatus = 'cached' | 'analyzed' | 'error';

export interface MediaAnalysisItem {
  mediaUrl: string;
  mediaKind: MediaKind;
  status: AnalysisStatus;
  downloaded: boolean;
  analysis?: AnalysisPayload;
  storagePath?: string;
  brandName?: string;
  adId?: string;
  error?: string;
  sourceCitation: string;
}

export interface MediaAnalysisReport {
  success: boolean;
  items: MediaAnalysisItem[];
  summary: {
    total: number;
    cached: number;
    analyzed: number;
    failed: number;
  };
}

export interface MediaAnalysisServiceOptions {
  imageTimeoutMs?: number;
  videoTimeoutMs?: number;
}

interface PendingAnalysis {
  target: AnalysisTarget;
  storagePath: string;
  contentType: string;
  downloaded: boolean;
  bytes?: Buffer;
  entry?: CacheEntry;
}

const DEFAULT_CONTENT_TYPE: Record<MediaKind, string> = {
  image: 'image/jpeg',
  video: 'video/mp4',
};

export function sourceCitation(target: AnalysisTarget): string {
  return `[Facebook Ad Library - ${target.brandName || 'Ad'} #${target.adId || 'Unknown'}](${target.url})`;
}

function dedupeTargets(targets: AnalysisTarget[]): AnalysisTarget[] {
  const seen = new Map<string, AnalysisTarget>();
  for (const target of targets) {
    if (!seen.has(target.url)) seen.set(target.url, target);
  }
  return [...seen.values()];
}

function contextFor(target: AnalysisTarget): string | undefined {
  const parts = [target.brandName && `brand ${target.brandName}`, target.adId && `ad ${target.adId}`].filter(Boolean);
  return parts.length > 0 ? parts.join(', ') : undefined;
}

/**
 * Serves image and video analyses from the media cache, downloading and
 * analysing only what the cache cannot answer. One URL failing never fails
 * the others.
 */
export class MediaAnalysisService {
  private readonly cache: MediaCacheService;
  private readonly fetcher: MediaFetcher;
  private readonly analyzer: MediaAnalyzer;
  private readonly options: MediaAnalysisServiceOptions;

  constructor(
    cache: MediaCacheService,
    fetcher: MediaFetcher,
    analyzer: MediaAnalyzer,
    options: MediaAnalysisServiceOptions = {}
  ) {
    this.cache = cache;
    this.fetcher = fetcher;
    this.analyzer = analyzer;
    this.options = options;
  }

  analyzeImages(targets: AnalysisTarget[]): Promise<MediaAnalysisReport> {
    return this.analyze('image', targets);
  }

  analyzeVideos(targets: AnalysisTarget[]): Promise<MediaAnalysisReport> {
    return this.analyze('video', targets);
  }

  private async analyze(kind: MediaKind, requested: AnalysisTarget[]): Promise<MediaAnalysisReport> {
    const items = new Map<string, MediaAnalysisItem>();
    const targets: AnalysisTarget[] = [];

    for (const target of dedupeTargets(requested)) {
      try {
        assertValidUrl(target.url);
        targets.push(target);
      } catch (error) {
        items.set(target.url, this.errorItem(kind, target, error, false));
      }
    }

    const urls = targets.map((target) => target.url);
    const cached = urls.length > 0 ? await this.cache.getCachedBatch(urls, kind) : new Map<string, CacheEntry | null>();
    const pending: PendingAnalysis[] = [];
    const misses: AnalysisTarget[] = [];

    for (const target of targets) {
      const entry = cached.get(target.url) ?? null;
      if (entry?.analysis) {
        items.set(target.url, {
          ...this.baseItem(kind, target, false),
          status: 'cached',
          analysis: entry.analysis,
          storagePath: entry.storagePath,
        });
      } else if (entry) {
        pending.push({
          target,
          storagePath: entry.storagePath,
          contentType: entry.contentType,
          downloaded: false,
          entry,
        });
      } else {
        misses.push(target);
      }
    }

    pending.push(...(await this.downloadAndStore(kind, misses, items)));

    for (const job of pending) {
      items.set(job.target.url, await this.runAnalysis(kind, job));
    }

    const ordered = dedupeTargets(requested).flatMap((target) => {
      const item = items.get(target.url);
      return item ? [item] : [];
    });
    const summary = {
      total: ordered.length,
      cached: ordered.filter((item) => item.status === 'cached').length,
      analyzed: ordered.filter((item) => item.status === 'analyzed').length,
      failed: ordered.filter((item) => item.status === 'error').length,
    };
    logger.info(`Analyzed ${kind} batch`, summary);
    return { success: summary.failed === 0, items: ordered, summary };
  }

  private async downloadAndStore(
    kind: MediaKind,
    misses: AnalysisTarget[],
    items: Map<string, MediaAnalysisItem>
  ): Promise<PendingAnalysis[]> {
    if (misses.length === 0) return [];

    const timeoutMs = kind === 'video' ? this.options.videoTimeoutMs : this.options.imageTimeoutMs;
    const downloads = await Promise.allSettled(misses.map((target) => this.fetcher.fetch(target.url, { timeoutMs })));

    const accepted: Array<{ target: AnalysisTarget; media: FetchedMedia }> = [];
    downloads.forEach((outcome, index) => {
      const target = misses[index];
      if (outcome.status === 'rejected') {
        items.set(target.url, this.errorItem(kind, target, outcome.reason, false));
        return;
      }
      const detected = classifyContentType(outcome.value.contentType);
      if (detected !== kind) {
        const error = new InvalidMediaError(
          `Expected ${kind} content but received '${outcome.value.contentType || 'unknown'}'`,
          outcome.value.contentType
        );
        items.set(target.url, this.errorItem(kind, target, error, true));
        return;
      }
      accepted.push({ target, media: outcome.value });
    });

    if (accepted.length === 0) return [];

    const inputs: PutMediaInput[] = accepted.map(({ target, media }) => ({
      url: target.url,
      bytes: media.bytes,
      contentType: media.contentType,
      mediaKind: kind,
      brandName: target.brandName,
      adId: target.adId,
    }));

    let storagePaths: string[];
    try {
      storagePaths = await this.cache.putBatch(inputs);
    } catch (error) {
      logger.error('Failed to cache downloaded media', { kind, message: describeError(error) });
      for (const { target } of accepted) {
        items.set(target.url, this.errorItem(kind, target, error, true));
      }
      return [];
    }

    return accepted.map(({ target, media }, index) => ({
      target,
      storagePath: storagePaths[index],
      contentType: media.contentType,
      downloaded: true,
      bytes: media.bytes,
    }));
  }

  private async runAnalysis(kind: MediaKind, job: PendingAnalysis): Promise<MediaAnalysisItem> {
    const mimeType = normalizeContentType(job.contentType) || DEFAULT_CONTENT_TYPE[kind];
    const context = contextFor(job.target);
    try {
      let analysis: AnalysisPayload;
      if (kind === 'image') {
        const bytes = job.bytes ?? (await this.readStored(job));
        analysis = await this.analyzer.analyzeImage({ bytes, mimeType, context });
      } else {
        analysis = await this.analyzer.analyzeVideo({ filePath: job.storagePath, mimeType, context });
      }

      const attached = await this.cache.attachAnalysis(
        job.target.url,
        analysis,
        kind === 'video' ? videoFacts(analysis) : {}
      );
      if (!attached) {
        logger.warn(`Analyzed ${kind} was removed from the cache before its result was stored`, {
          url: job.target.url,
        });
        return {
          ...this.baseItem(kind, job.target, job.downloaded),
          status: 'error',
          analysis,
          error: 'Analysis completed but was not cached because the media entry was removed',
        };
      }
      return {
        ...this.baseItem(kind, job.target, job.downloaded),
        status: 'analyzed',
        analysis,
        storagePath: job.storagePath,
      };
    } catch (error) {
      logger.error(`Failed to analyze ${kind}`, { url: job.target.url, message: describeError(error) });
      return { ...this.errorItem(kind, job.target, error, job.downloaded), storagePath: job.storagePath };
    }
  }

  private async readStored(job: PendingAnalysis): Promise<Buffer> {
    if (!job.entry) {
      throw new Error(`No media bytes available for ${job.target.url}`);
    }
    return this.cache.readBytes(job.entry);
  }

  private baseItem(kind: MediaKind, target: AnalysisTarget, downloaded: boolean): Omit<MediaAnalysisItem, 'status'> {
    const item: Omit<MediaAnalysisItem, 'status'> = {
      mediaUrl: target.url,
      mediaKind: kind,
      downloaded,
      sourceCitation: sourceCitation(target),
    };
    if (target.brandName) item.brandName = target.brandName;
    if (target.adId) item.adId = target.adId;
    return item;
  }

  private errorItem(kind: MediaKind, target: AnalysisTarget, error: unknown, downloaded: boolean): MediaAnalysisItem {
    return {
      ...this.baseItem(kind, target, downloaded),
      status: 'error',
      error: describeError(error),
    };
  }
}
