import axios, { type AxiosResponse } from 'axios';
import type { MediaKind } from '../cache/types.js';
import { logger } from '../utils/logger.js';
import { MediaFetchError } from './errors.js';
import { describeHttpFailure, headerValue, type HttpClient } from './http-client.js';

export interface FetchedMedia {
  url: string;
  bytes: Buffer;
  contentType: string;
}

export interface FetchOptions {
  timeoutMs?: number;
}

export interface MediaFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchedMedia>;
}

interface HttpMediaFetcherOptions {
  timeoutMs: number;
  httpClient?: HttpClient;
}

const IMAGE_HINTS = ['image/', 'jpeg', 'jpg', 'png', 'gif', 'webp'];
const VIDEO_HINTS = ['video/', 'mp4', 'mov', 'webm', 'avi'];

/** Guesses the media kind from a Content-Type header; null when it is neither. */
export function classifyContentType(contentType: string): MediaKind | null {
  const normalized = contentType.toLowerCase();
  if (VIDEO_HINTS.some((hint) => normalized.includes(hint))) return 'video';
  if (IMAGE_HINTS.some((hint) => normalized.includes(hint))) return 'image';
  return null;
}

export class HttpMediaFetcher implements MediaFetcher {
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;

  constructor(options: HttpMediaFetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.httpClient = options.httpClient || axios.create();
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedMedia> {
    const timeout = options.timeoutMs ?? this.timeoutMs;
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.httpClient.request<ArrayBuffer>({
        method: 'GET',
        url,
        responseType: 'arraybuffer',
        timeout,
        validateStatus: () => true,
      });
    } catch (error) {
      const failure = describeHttpFailure(error);
      throw new MediaFetchError(`Failed to download media from ${url}: ${failure.message}`, {
        url,
        status: failure.status,
        cause: error,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new MediaFetchError(`Failed to download media from ${url}: HTTP ${response.status}`, {
        url,
        status: response.status,
      });
    }

    const contentType = (headerValue(response.headers['content-type']) ?? '').toLowerCase();
    const bytes = Buffer.from(response.data);
    logger.debug('Downloaded media', { url, contentType, sizeBytes: bytes.length });
    return { url, bytes, contentType };
  }
}
