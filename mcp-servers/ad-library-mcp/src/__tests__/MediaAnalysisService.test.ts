import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { MediaCacheService } from '../cache/media-cache-service.js';
import { identifyUrl } from '../cache/url-identity.js';
import { MediaFetchError } from '../clients/errors.js';
import type { FetchedMedia } from '../clients/media-fetcher.js';
import { MediaAnalysisService, sourceCitation } from '../services/MediaAnalysisService.js';

const IMAGE_URL = 'https://cdn.example.com/ad-1.jpg';
const OTHER_IMAGE_URL = 'https://cdn.example.com/ad-2.jpg';
const VIDEO_URL = 'https://cdn.example.com/ad-3.mp4';

function media(url: string, contentType: string, body = 'bytes'): FetchedMedia {
  return { url, bytes: Buffer.from(body), contentType };
}

describe('MediaAnalysisService', () => {
  let rootDir: string;
  let cache: MediaCacheService;
  let fetcher: { fetch: jest.Mock };
  let analyzer: { model: string; analyzeImage: jest.Mock; analyzeVideo: jest.Mock };
  let service: MediaAnalysisService;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'media-analysis-'));
    cache = MediaCacheService.open({ rootDir });
    fetcher = { fetch: jest.fn() };
    analyzer = { model: 'test-model', analyzeImage: jest.fn(), analyzeVideo: jest.fn() };
    service = new MediaAnalysisService(cache, fetcher, analyzer, { imageTimeoutMs: 1000, videoTimeoutMs: 5000 });
  });

  afterEach(async () => {
    cache.close();
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('downloads, stores and analyzes an uncached image once', async () => {
    fetcher.fetch.mockResolvedValueOnce(media(IMAGE_URL, 'image/jpeg', 'jpeg-bytes'));
    analyzer.analyzeImage.mockResolvedValueOnce({ summary: 'Sneaker close-up', model_used: 'test-model' });

    const first = await service.analyzeImages([{ url: IMAGE_URL, brandName: 'Acme', adId: '42' }]);

    const storagePath = path.join(rootDir, 'images', `${identifyUrl(IMAGE_URL)}.jpg`);
    expect(first.items).toEqual([
      {
        mediaUrl: IMAGE_URL,
        mediaKind: 'image',
        status: 'analyzed',
        downloaded: true,
        analysis: { summary: 'Sneaker close-up', model_used: 'test-model' },
        storagePath,
        brandName: 'Acme',
        adId: '42',
        sourceCitation: `[Facebook Ad Library - Acme #42](${IMAGE_URL})`,
      },
    ]);
    expect(first.summary).toEqual({ total: 1, cached: 0, analyzed: 1, failed: 0 });
    expect(fetcher.fetch).toHaveBeenCalledWith(IMAGE_URL, { timeoutMs: 1000 });
    expect(analyzer.analyzeImage).toHaveBeenCalledWith({
      bytes: Buffer.from('jpeg-bytes'),
      mimeType: 'image/jpeg',
      context: 'brand Acme, ad 42',
    });

    const second = await service.analyzeImages([{ url: IMAGE_URL }]);

    expect(second.items[0].status).toBe('cached');
    expect(second.items[0].downloaded).toBe(false);
    expect(second.items[0].analysis).toEqual({ summary: 'Sneaker close-up', model_used: 'test-model' });
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
    expect(analyzer.analyzeImage).toHaveBeenCalledTimes(1);
  });

  it('analyzes cached bytes without downloading again', async () => {
    await cache.put({
      url: IMAGE_URL,
      bytes: Buffer.from('stored-bytes'),
      contentType: 'image/png',
      mediaKind: 'image',
    });
    analyzer.analyzeImage.mockResolvedValueOnce({ summary: 'Logo on white' });

    const report = await service.analyzeImages([{ url: IMAGE_URL }]);

    expect(fetcher.fetch).not.toHaveBeenCalled();
    expect(analyzer.analyzeImage).toHaveBeenCalledWith({
      bytes: Buffer.from('stored-bytes'),
      mimeType: 'image/png',
      context: undefined,
    });
    expect(report.items[0]).toMatchObject({ status: 'analyzed', downloaded: false });
    expect((await cache.getCached(IMAGE_URL))?.analysis).toEqual({ summary: 'Logo on white' });
  });

  it('rejects downloads of the wrong media kind without caching them', async () => {
    fetcher.fetch.mockResolvedValueOnce(media(IMAGE_URL, 'text/html'));

    const report = await service.analyzeImages([{ url: IMAGE_URL }]);

    expect(report.success).toBe(false);
    expect(report.items[0]).toMatchObject({
      status: 'error',
      downloaded: true,
      error: "Expected image content but received 'text/html'",
    });
    expect(analyzer.analyzeImage).not.toHaveBeenCalled();
    await expect(cache.getCached(IMAGE_URL)).resolves.toBeNull();
  });

  it('keeps going when one download fails and preserves request order', async () => {
    fetcher.fetch.mockImplementation(async (url: string) => {
      if (url === IMAGE_URL) {
        throw new MediaFetchError(`Failed to download media from ${url}: HTTP 404`, { url, status: 404 });
      }
      return media(url, 'image/jpeg');
    });
    analyzer.analyzeImage.mockResolvedValue({ summary: 'ok' });

    const report = await service.analyzeImages([{ url: IMAGE_URL }, { url: OTHER_IMAGE_URL }, { url: IMAGE_URL }]);

    expect(report.items.map((item) => [item.mediaUrl, item.status])).toEqual([
      [IMAGE_URL, 'error'],
      [OTHER_IMAGE_URL, 'analyzed'],
    ]);
    expect(report.items[0].error).toBe(`Failed to download media from ${IMAGE_URL}: HTTP 404`);
    expect(report.summary).toEqual({ total: 2, cached: 0, analyzed: 1, failed: 1 });
    expect(fetcher.fetch).toHaveBeenCalledTimes(2);
  });

  it('reports blank URLs as errors without touching the network', async () => {
    const report = await service.analyzeImages([{ url: '  ' }]);

    expect(report.items).toEqual([
      {
        mediaUrl: '  ',
        mediaKind: 'image',
        status: 'error',
        downloaded: false,
        error: 'Media URL must be a non-empty string',
        sourceCitation: '[Facebook Ad Library - Ad #Unknown](  )',
      },
    ]);
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });

  it('keeps the download when analysis fails so a retry skips the fetch', async () => {
    fetcher.fetch.mockResolvedValueOnce(media(IMAGE_URL, 'image/jpeg'));
    analyzer.analyzeImage.mockRejectedValueOnce(new Error('model overloaded'));
    analyzer.analyzeImage.mockResolvedValueOnce({ summary: 'second try' });

    const failed = await service.analyzeImages([{ url: IMAGE_URL }]);
    expect(failed.items[0]).toMatchObject({ status: 'error', downloaded: true, error: 'model overloaded' });

    const retried = await service.analyzeImages([{ url: IMAGE_URL }]);
    expect(retried.items[0]).toMatchObject({ status: 'analyzed', downloaded: false });
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
  });

  it('reports an error when the entry disappears before the analysis is stored', async () => {
    const storagePath = path.join(rootDir, 'images', `${identifyUrl(IMAGE_URL)}.jpg`);
    fetcher.fetch.mockResolvedValueOnce(media(IMAGE_URL, 'image/jpeg'));
    analyzer.analyzeImage.mockImplementationOnce(async () => {
      await fs.unlink(storagePath);
      await cache.getCached(IMAGE_URL);
      return { summary: 'late result' };
    });

    const report = await service.analyzeImages([{ url: IMAGE_URL }]);

    expect(report.success).toBe(false);
    expect(report.summary).toEqual({ total: 1, cached: 0, analyzed: 0, failed: 1 });
    expect(report.items[0]).toMatchObject({
      status: 'error',
      downloaded: true,
      analysis: { summary: 'late result' },
      error: 'Analysis completed but was not cached because the media entry was removed',
    });
    expect(report.items[0].storagePath).toBeUndefined();
    expect(await cache.getCached(IMAGE_URL)).toBeNull();
  });

  it('analyzes videos from their stored file and records duration and audio', async () => {
    fetcher.fetch.mockResolvedValueOnce(media(VIDEO_URL, 'video/mp4', 'mp4-bytes'));
    analyzer.analyzeVideo.mockResolvedValueOnce({
      summary: 'Unboxing',
      duration_seconds: 12,
      audio: { has_voiceover: true, has_music: false, transcript: 'Open it up' },
    });

    const report = await service.analyzeVideos([{ url: VIDEO_URL, brandName: 'Acme' }]);

    const storagePath = path.join(rootDir, 'videos', `${identifyUrl(VIDEO_URL)}.mp4`);
    expect(fetcher.fetch).toHaveBeenCalledWith(VIDEO_URL, { timeoutMs: 5000 });
    expect(analyzer.analyzeVideo).toHaveBeenCalledWith({
      filePath: storagePath,
      mimeType: 'video/mp4',
      context: 'brand Acme',
    });
    expect(report.items[0]).toMatchObject({ status: 'analyzed', storagePath, mediaKind: 'video' });

    const entry = await cache.getCached(VIDEO_URL, 'video');
    expect(entry?.durationSeconds).toBe(12);
    expect(entry?.hasAudio).toBe(true);
  });
});

describe('sourceCitation', () => {
  it('falls back to placeholders for missing brand and ad id', () => {
    expect(sourceCitation({ url: 'https://cdn.example.com/x.jpg' })).toBe(
      '[Facebook Ad Library - Ad #Unknown](https://cdn.example.com/x.jpg)'
    );
  });
});
