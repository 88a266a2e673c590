import type { AdRecord } from '../clients/ad-parser.js';
import { MAX_ADS_PER_REQUEST, type AdLibraryClient, type SearchAdsOptions } from '../clients/ad-library-client.js';
import { ConfigurationError, CreditExhaustedError, RateLimitError } from '../clients/errors.js';
import { logger } from '../utils/logger.js';

export interface PlatformIdLookupParams {
  brandNames: string[];
}

export interface GetAdsParams {
  platformIds: string[];
  limit: number;
  country?: string;
}

export interface GetExternalAdsParams extends GetAdsParams {
  /** Fetch deeper when fewer external ads than this turn up. */
  minResults?: number;
}

export interface SearchAdsParams extends SearchAdsOptions {
  query: string;
}

export interface PlatformIdResult {
  success: boolean;
  results: Record<string, Record<string, string>>;
  failed: Record<string, string>;
  totalBrands: number;
}

export interface AdsResult {
  success: boolean;
  results: Record<string, AdRecord[]>;
  failed: Record<string, string>;
  totalAds: number;
}

export interface UtmAnalysis {
  totalAdsWithUtm: number;
  utmParametersFound: string[];
  utmSummary: Record<string, string>;
}

export interface ExternalAdsResult extends AdsResult {
  externalAdsCount: number;
  totalAdsScanned: number;
  utmAnalysis: UtmAnalysis;
  domains: string[];
}

export interface KeywordSearchResult {
  success: boolean;
  query: string;
  ads: AdRecord[];
  totalAds: number;
  error?: string;
}

function uniqueTrimmed(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter(Boolean))];
}

/** Errors the caller must see instead of an empty result. */
function isFatal(error: unknown): boolean {
  return error instanceof CreditExhaustedError || error instanceof RateLimitError || error instanceof ConfigurationError;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function analyzeUtm(ads: AdRecord[]): UtmAnalysis {
  const utmSummary: Record<string, string> = {};
  let totalAdsWithUtm = 0;
  for (const ad of ads) {
    const entries = Object.entries(ad.utmParams);
    if (entries.length > 0) totalAdsWithUtm += 1;
    for (const [key, value] of entries) {
      utmSummary[key] = value;
    }
  }
  return { totalAdsWithUtm, utmParametersFound: Object.keys(utmSummary), utmSummary };
}

export class AdLibraryService {
  private readonly client: AdLibraryClient;

  constructor(client: AdLibraryClient) {
    this.client = client;
  }

  async getPlatformIds(params: PlatformIdLookupParams): Promise<PlatformIdResult> {
    const brands = uniqueTrimmed(params.brandNames);
    const results: Record<string, Record<string, string>> = {};
    const failed: Record<string, string> = {};

    for (const brand of brands) {
      try {
        results[brand] = await this.client.searchCompanies(brand);
      } catch (error) {
        if (isFatal(error)) throw error;
        logger.error('Platform id lookup failed', { brand, message: messageOf(error) });
        failed[brand] = messageOf(error);
      }
    }

    return {
      success: Object.keys(failed).length === 0,
      results,
      failed,
      totalBrands: brands.length,
    };
  }

  async getAds(params: GetAdsParams): Promise<AdsResult> {
    const platformIds = uniqueTrimmed(params.platformIds);
    const results: Record<string, AdRecord[]> = {};
    const failed: Record<string, string> = {};

    for (const platformId of platformIds) {
      try {
        results[platformId] = await this.client.getAds(platformId, { limit: params.limit, country: params.country });
      } catch (error) {
        if (isFatal(error)) throw error;
        logger.error('Ad retrieval failed', { platformId, message: messageOf(error) });
        results[platformId] = [];
        failed[platformId] = messageOf(error);
      }
    }

    return {
      success: Object.keys(failed).length === 0,
      results,
      failed,
      totalAds: Object.values(results).reduce((sum, ads) => sum + ads.length, 0),
    };
  }

  /**
   * Like getAds, but keeps only ads that link off Meta and Google properties.
   * When `minResults` is not met and a full page came back, the page is
   * fetched once more at twice the size.
   */
  async getExternalAds(params: GetExternalAdsParams): Promise<ExternalAdsResult> {
    const platformIds = uniqueTrimmed(params.platformIds);
    const minResults = params.minResults ?? 0;
    const fetchLimit =
      minResults > params.limit ? Math.min(minResults * 2, MAX_ADS_PER_REQUEST) : params.limit;
    const results: Record<string, AdRecord[]> = {};
    const failed: Record<string, string> = {};
    let totalAdsScanned = 0;

    for (const platformId of platformIds) {
      try {
        let ads = await this.client.getAds(platformId, { limit: fetchLimit, country: params.country });
        let external = ads.filter((ad) => ad.hasExternalLinks);
        const deeperLimit = Math.min(fetchLimit * 2, MAX_ADS_PER_REQUEST);
        if (external.length < minResults && ads.length >= fetchLimit && deeperLimit > fetchLimit) {
          ads = await this.client.getAds(platformId, { limit: deeperLimit, country: params.country });
          external = ads.filter((ad) => ad.hasExternalLinks);
        }
        totalAdsScanned += ads.length;
        results[platformId] = external.slice(0, params.limit);
      } catch (error) {
        if (isFatal(error)) throw error;
        logger.error('External ad retrieval failed', { platformId, message: messageOf(error) });
        results[platformId] = [];
        failed[platformId] = messageOf(error);
      }
    }

    const externalAds = Object.values(results).flat();
    const domains = [...new Set(externalAds.flatMap((ad) => ad.domains))].sort();
    logger.info('External ads retrieved', { externalAds: externalAds.length, totalAdsScanned });

    return {
      success: Object.keys(failed).length === 0,
      results,
      failed,
      totalAds: externalAds.length,
      externalAdsCount: externalAds.length,
      totalAdsScanned,
      utmAnalysis: analyzeUtm(externalAds),
      domains,
    };
  }

  async searchAds(params: SearchAdsParams): Promise<KeywordSearchResult> {
    const { query, ...options } = params;
    try {
      const ads = await this.client.searchAds(query, options);
      return { success: true, query, ads, totalAds: ads.length };
    } catch (error) {
      if (isFatal(error)) throw error;
      logger.error('Keyword ad search failed', { query, message: messageOf(error) });
      return { success: false, query, ads: [], totalAds: 0, error: messageOf(error) };
    }
  }
}
