import axios, { type AxiosResponse } from 'axios';
import { logger } from '../utils/logger.js';
import { parseAds, type AdRecord } from './ad-parser.js';
import {
  AdLibraryApiError,
  ConfigurationError,
  CreditExhaustedError,
  RateLimitError,
} from './errors.js';
import { describeHttpFailure, headerValue, type HttpClient } from './http-client.js';

export const MAX_ADS_PER_REQUEST = 1500;

export type AdTypeFilter = 'ALL' | 'POLITICAL_AND_ISSUE_ADS';
export type AdMediaFilter = 'ALL' | 'IMAGE' | 'VIDEO' | 'MEME' | 'IMAGE_AND_MEME' | 'NONE';
export type ActiveStatusFilter = 'ACTIVE' | 'INACTIVE' | 'ALL';

export interface GetAdsOptions {
  limit: number;
  country?: string;
}

export interface SearchAdsOptions extends GetAdsOptions {
  adType?: AdTypeFilter;
  mediaType?: AdMediaFilter;
  activeStatus?: ActiveStatusFilter;
}

export interface CreditInfo {
  creditsRemaining?: number;
  creditCost?: number;
}

export interface AdLibraryClient {
  searchCompanies(brandName: string): Promise<Record<string, string>>;
  getAds(pageId: string, options: GetAdsOptions): Promise<AdRecord[]>;
  searchAds(query: string, options: SearchAdsOptions): Promise<AdRecord[]>;
}

interface ScrapeCreatorsClientOptions {
  apiKey?: string;
  timeoutMs: number;
  httpClient?: HttpClient;
  baseUrl?: string;
  now?: () => Date;
}

const CREDITS_REMAINING_HEADERS = ['x-credits-remaining', 'x-credit-remaining', 'credits-remaining'];
const CREDIT_COST_HEADERS = ['x-credit-cost', 'credit-cost', 'x-credits-used'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstIntHeader(headers: Record<string, unknown>, names: string[]): number | undefined {
  for (const name of names) {
    const raw = headerValue(headers[name]);
    if (raw === undefined) continue;
    const parsed = Number.parseInt(raw, 10);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

export function parseCreditInfo(headers: Record<string, unknown>): CreditInfo | undefined {
  const creditsRemaining = firstIntHeader(headers, CREDITS_REMAINING_HEADERS);
  const creditCost = firstIntHeader(headers, CREDIT_COST_HEADERS);
  if (creditsRemaining === undefined && creditCost === undefined) {
    return undefined;
  }
  return { creditsRemaining, creditCost };
}

function mentionsCredits(data: unknown): boolean {
  const text = (typeof data === 'string' ? data : JSON.stringify(data ?? '')).toLowerCase();
  return text.includes('credit') || text.includes('quota');
}

function describeApiError(status: number, data: unknown): string {
  const parts = [`Ad library request failed with status ${status}`];
  if (isRecord(data)) {
    const message = typeof data.message === 'string' ? data.message : typeof data.error === 'string' ? data.error : undefined;
    if (message) parts.push(`message=${message}`);
  } else if (typeof data === 'string' && data) {
    parts.push(`body=${data.length > 200 ? `${data.slice(0, 200)}...` : data}`);
  }
  return parts.join(' | ');
}

/**
 * Throws the typed error for a non-2xx ad-library response; credit and rate
 * limit failures get their own classes so callers can surface them.
 */
export function assertAdLibraryResponse(response: Pick<AxiosResponse, 'status' | 'data' | 'headers'>): void {
  const { status, data } = response;
  if (status >= 200 && status < 300) return;

  if (status === 402) {
    throw new CreditExhaustedError(
      'ScrapeCreators API credits exhausted. Please top up your account to continue.',
      status
    );
  }
  if (status === 429) {
    const retryAfter = Number.parseInt(headerValue(response.headers?.['retry-after']) ?? '', 10);
    throw new RateLimitError(
      'ScrapeCreators API rate limit exceeded. Please wait before making more requests.',
      Number.isFinite(retryAfter) ? retryAfter : undefined
    );
  }
  if (status === 403 && mentionsCredits(data)) {
    throw new CreditExhaustedError(
      'ScrapeCreators API access denied. This may indicate insufficient credits.',
      status
    );
  }
  throw new AdLibraryApiError(describeApiError(status, data), status);
}

export class ScrapeCreatorsClient implements AdLibraryClient {
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;
  private readonly baseUrl: string;
  private readonly now: () => Date;

  constructor(options: ScrapeCreatorsClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.httpClient = options.httpClient || axios.create();
    this.baseUrl = options.baseUrl || 'https://api.scrapecreators.com/v1/facebook/adLibrary';
    this.now = options.now || (() => new Date());
  }

  async searchCompanies(brandName: string): Promise<Record<string, string>> {
    const data = await this.get('search/companies', { query: brandName });
    const results = isRecord(data) && Array.isArray(data.searchResults) ? data.searchResults : [];
    logger.info('Ad library company search', { brandName, results: results.length });

    const options: Record<string, string> = {};
    for (const result of results) {
      if (!isRecord(result)) continue;
      const name = result.name;
      const pageId = result.page_id;
      if (typeof name === 'string' && name && (typeof pageId === 'string' || typeof pageId === 'number')) {
        options[name] = String(pageId);
      }
    }
    return options;
  }

  async getAds(pageId: string, options: GetAdsOptions): Promise<AdRecord[]> {
    const params: Record<string, string | number> = {
      pageId,
      limit: Math.min(options.limit, MAX_ADS_PER_REQUEST),
      trim: 'true',
    };
    if (options.country) params.country = options.country.toUpperCase();

    const data = await this.get('company/ads', params);
    const results = isRecord(data) && Array.isArray(data.results) ? data.results : [];
    logger.info('Retrieved ads for page', { pageId, results: results.length });
    return parseAds(results, { filterInactive: true, now: this.now() }).slice(0, options.limit);
  }

  async searchAds(query: string, options: SearchAdsOptions): Promise<AdRecord[]> {
    const params: Record<string, string | number> = {
      query,
      limit: Math.min(options.limit, MAX_ADS_PER_REQUEST),
      ad_type: options.adType ?? 'ALL',
      media_type: options.mediaType ?? 'ALL',
      active_status: options.activeStatus ?? 'ACTIVE',
      trim: 'true',
    };
    if (options.country) params.country = options.country.toUpperCase();

    const data = await this.get('search/ads', params);
    const results = isRecord(data) && Array.isArray(data.searchResults) ? data.searchResults : [];
    logger.info('Retrieved ads for keyword', { query, results: results.length });
    return parseAds(results, { filterInactive: false, now: this.now() }).slice(0, options.limit);
  }

  private requireApiKey(): string {
    if (!this.apiKey) {
      throw new ConfigurationError(
        'SCRAPECREATORS_API_KEY is not set. Add it to the environment to query the ad library.'
      );
    }
    return this.apiKey;
  }

  private async get(path: string, params: Record<string, string | number>): Promise<unknown> {
    const apiKey = this.requireApiKey();
    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.request<unknown>({
        method: 'GET',
        url: `${this.baseUrl}/${path}`,
        headers: { 'x-api-key': apiKey },
        params,
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      const failure = describeHttpFailure(error);
      throw new AdLibraryApiError(`Ad library request to ${path} failed: ${failure.message}`, failure.status);
    }

    assertAdLibraryResponse(response);

    const credits = parseCreditInfo(isRecord(response.headers) ? response.headers : {});
    if (credits) {
      logger.info('Ad library credit usage', { path, ...credits });
    }
    return response.data;
  }
}
