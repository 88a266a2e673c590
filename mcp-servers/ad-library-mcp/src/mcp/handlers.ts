import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { MediaCacheService } from '../cache/media-cache-service.js';
import type { AdLibraryService } from '../services/AdLibraryService.js';
import type { AnalysisTarget, MediaAnalysisService } from '../services/MediaAnalysisService.js';
import { logger } from '../utils/logger.js';
import {
  AnalyzeAdImageSchema,
  AnalyzeAdVideoSchema,
  AnalyzeAdVideosBatchSchema,
  CleanupMediaCacheSchema,
  GetCacheStatsSchema,
  GetMetaAdsExternalOnlySchema,
  GetMetaAdsSchema,
  GetMetaPlatformIdSchema,
  SearchAdsByKeywordSchema,
  SearchCachedMediaSchema,
  isToolName,
  tools,
} from './tools.js';

export class UnknownToolError extends Error {
  readonly code = 'UNKNOWN_TOOL';

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export interface ToolHandlerDependencies {
  adLibrary: AdLibraryService;
  mediaAnalysis: MediaAnalysisService;
  mediaCache: MediaCacheService;
  defaultMaxAgeDays?: number;
}

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  return schema.parse(args || {});
}

export class AdLibraryToolHandlers {
  private readonly adLibrary: AdLibraryService;
  private readonly mediaAnalysis: MediaAnalysisService;
  private readonly mediaCache: MediaCacheService;
  private readonly defaultMaxAgeDays: number;

  constructor(dependencies: ToolHandlerDependencies) {
    this.adLibrary = dependencies.adLibrary;
    this.mediaAnalysis = dependencies.mediaAnalysis;
    this.mediaCache = dependencies.mediaCache;
    this.defaultMaxAgeDays = dependencies.defaultMaxAgeDays ?? 30;
  }

  getTools(): Tool[] {
    return tools;
  }

  async handleToolCall(toolName: string, args: unknown): Promise<unknown> {
    if (!isToolName(toolName)) {
      throw new UnknownToolError(toolName);
    }

    logger.info('Processing MCP tool call', { toolName });

    switch (toolName) {
      case 'get_meta_platform_id': {
        const parsed = parseArgs(GetMetaPlatformIdSchema, args);
        return this.adLibrary.getPlatformIds({ brandNames: parsed.brandNames });
      }
      case 'get_meta_ads': {
        const parsed = parseArgs(GetMetaAdsSchema, args);
        return this.adLibrary.getAds(parsed);
      }
      case 'get_meta_ads_external_only': {
        const parsed = parseArgs(GetMetaAdsExternalOnlySchema, args);
        return this.adLibrary.getExternalAds(parsed);
      }
      case 'search_ads_by_keyword': {
        const parsed = parseArgs(SearchAdsByKeywordSchema, args);
        return this.adLibrary.searchAds(parsed);
      }
      case 'analyze_ad_image': {
        const parsed = parseArgs(AnalyzeAdImageSchema, args);
        return this.mediaAnalysis.analyzeImages(
          parsed.mediaUrls.map((url) => ({ url, brandName: parsed.brandName, adId: parsed.adId }))
        );
      }
      case 'analyze_ad_video': {
        const parsed = parseArgs(AnalyzeAdVideoSchema, args);
        return this.mediaAnalysis.analyzeVideos([
          { url: parsed.mediaUrl, brandName: parsed.brandName, adId: parsed.adId },
        ]);
      }
      case 'analyze_ad_videos_batch': {
        const parsed = parseArgs(AnalyzeAdVideosBatchSchema, args);
        const targets: AnalysisTarget[] = parsed.mediaUrls.map((url, index) => ({
          url,
          brandName: parsed.brandNames?.[index],
          adId: parsed.adIds?.[index],
        }));
        return this.mediaAnalysis.analyzeVideos(targets);
      }
      case 'get_cache_stats': {
        parseArgs(GetCacheStatsSchema, args);
        const stats = await this.mediaCache.stats();
        return {
          success: true,
          stats,
          message: `Cache holds ${stats.totalFiles} files (${stats.totalSizeMb} MB), ${stats.analyzedFiles} analyzed`,
        };
      }
      case 'search_cached_media': {
        const parsed = parseArgs(SearchCachedMediaSchema, args);
        const results = await this.mediaCache.search({
          brandName: parsed.brandName,
          hasPeople: parsed.hasPeople,
          colorContains: parsed.colorContains,
          mediaKind: parsed.mediaType,
          limit: parsed.limit,
        });
        return { success: true, count: results.length, results };
      }
      case 'cleanup_media_cache': {
        const parsed = parseArgs(CleanupMediaCacheSchema, args);
        const report = await this.mediaCache.evictOlderThan(parsed.maxAgeDays ?? this.defaultMaxAgeDays);
        return {
          success: true,
          report,
          message: `Removed ${report.filesRemoved} files older than ${report.maxAgeDays} days`,
        };
      }
      default:
        throw new UnknownToolError(toolName);
    }
  }
}
