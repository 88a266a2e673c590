import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

const nonEmpty = z.string().trim().min(1);
const oneOrMany = z.union([nonEmpty, z.array(nonEmpty).min(1)]).transform((value) => (Array.isArray(value) ? value : [value]));
const limit = (fallback: number, max: number) => z.number().int().positive().max(max).optional().default(fallback);
const country = z.string().trim().length(2).optional();

export const GetMetaPlatformIdSchema = z.object({
  brandNames: oneOrMany,
});

export const GetMetaAdsSchema = z.object({
  platformIds: oneOrMany,
  limit: limit(50, 1500),
  country,
});

export const GetMetaAdsExternalOnlySchema = GetMetaAdsSchema.extend({
  minResults: z.number().int().positive().max(1500).optional(),
});

export const SearchAdsByKeywordSchema = z.object({
  query: nonEmpty,
  limit: limit(50, 1500),
  country,
  adType: z.enum(['ALL', 'POLITICAL_AND_ISSUE_ADS']).optional().default('ALL'),
  mediaType: z.enum(['ALL', 'IMAGE', 'VIDEO', 'MEME', 'IMAGE_AND_MEME', 'NONE']).optional().default('ALL'),
  activeStatus: z.enum(['ACTIVE', 'INACTIVE', 'ALL']).optional().default('ACTIVE'),
});

export const AnalyzeAdImageSchema = z.object({
  mediaUrls: oneOrMany,
  brandName: z.string().optional(),
  adId: z.string().optional(),
});

export const AnalyzeAdVideoSchema = z.object({
  mediaUrl: nonEmpty,
  brandName: z.string().optional(),
  adId: z.string().optional(),
});

export const AnalyzeAdVideosBatchSchema = z.object({
  mediaUrls: z.array(nonEmpty).min(1),
  brandNames: z.array(z.string()).optional(),
  adIds: z.array(z.string()).optional(),
});

export const GetCacheStatsSchema = z.object({});

export const SearchCachedMediaSchema = z.object({
  brandName: z.string().optional(),
  hasPeople: z.boolean().optional(),
  colorContains: z.string().optional(),
  mediaType: z.enum(['image', 'video']).optional(),
  limit: limit(20, 500),
});

export const CleanupMediaCacheSchema = z.object({
  maxAgeDays: z.number().nonnegative().optional(),
});

const stringOrArray = {
  oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
};

export const tools: Tool[] = [
  {
    name: 'get_meta_platform_id',
    description: 'Find Facebook page ids for one or more brand names in the Ad Library',
    inputSchema: {
      type: 'object',
      properties: {
        brandNames: stringOrArray,
      },
      required: ['brandNames'],
    },
  },
  {
    name: 'get_meta_ads',
    description: 'Retrieve current ads for one or more Facebook page ids',
    inputSchema: {
      type: 'object',
      properties: {
        platformIds: stringOrArray,
        limit: { type: 'number', default: 50, maximum: 1500 },
        country: { type: 'string', description: 'ISO 3166-1 alpha-2 country code' },
      },
      required: ['platformIds'],
    },
  },
  {
    name: 'get_meta_ads_external_only',
    description:
      'Retrieve ads that link to external websites, with full destination URLs, UTM parameters and the domains found',
    inputSchema: {
      type: 'object',
      properties: {
        platformIds: stringOrArray,
        limit: { type: 'number', default: 50, maximum: 1500 },
        country: { type: 'string', description: 'ISO 3166-1 alpha-2 country code' },
        minResults: {
          type: 'number',
          description: 'Fetch more ads when fewer external ones than this are found',
        },
      },
      required: ['platformIds'],
    },
  },
  {
    name: 'search_ads_by_keyword',
    description: 'Search the Ad Library for ads matching a keyword',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string' },
        limit: { type: 'number', default: 50, maximum: 1500 },
        country: { type: 'string' },
        adType: { type: 'string', enum: ['ALL', 'POLITICAL_AND_ISSUE_ADS'], default: 'ALL' },
        mediaType: {
          type: 'string',
          enum: ['ALL', 'IMAGE', 'VIDEO', 'MEME', 'IMAGE_AND_MEME', 'NONE'],
          default: 'ALL',
        },
        activeStatus: { type: 'string', enum: ['ACTIVE', 'INACTIVE', 'ALL'], default: 'ACTIVE' },
      },
      required: ['query'],
    },
  },
  {
    name: 'analyze_ad_image',
    description: 'Analyze ad images, reusing cached downloads and analyses',
    inputSchema: {
      type: 'object',
      properties: {
        mediaUrls: stringOrArray,
        brandName: { type: 'string' },
        adId: { type: 'string' },
      },
      required: ['mediaUrls'],
    },
  },
  {
    name: 'analyze_ad_video',
    description: 'Analyze an ad video, reusing the cached download and analysis',
    inputSchema: {
      type: 'object',
      properties: {
        mediaUrl: { type: 'string' },
        brandName: { type: 'string' },
        adId: { type: 'string' },
      },
      required: ['mediaUrl'],
    },
  },
  {
    name: 'analyze_ad_videos_batch',
    description: 'Analyze several ad videos; brandNames and adIds pair with mediaUrls by position',
    inputSchema: {
      type: 'object',
      properties: {
        mediaUrls: { type: 'array', items: { type: 'string' } },
        brandNames: { type: 'array', items: { type: 'string' } },
        adIds: { type: 'array', items: { type: 'string' } },
      },
      required: ['mediaUrls'],
    },
  },
  {
    name: 'get_cache_stats',
    description: 'Report media cache size and analysis coverage',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'search_cached_media',
    description: 'Search cached media by brand, people, color or media type',
    inputSchema: {
      type: 'object',
      properties: {
        brandName: { type: 'string' },
        hasPeople: { type: 'boolean' },
        colorContains: { type: 'string' },
        mediaType: { type: 'string', enum: ['image', 'video'] },
        limit: { type: 'number', default: 20 },
      },
    },
  },
  {
    name: 'cleanup_media_cache',
    description: 'Remove cached media created more than maxAgeDays ago (defaults to the configured cache age)',
    inputSchema: {
      type: 'object',
      properties: {
        maxAgeDays: { type: 'number' },
      },
    },
  },
];

export const toolSchemas = {
  get_meta_platform_id: GetMetaPlatformIdSchema,
  get_meta_ads: GetMetaAdsSchema,
  get_meta_ads_external_only: GetMetaAdsExternalOnlySchema,
  search_ads_by_keyword: SearchAdsByKeywordSchema,
  analyze_ad_image: AnalyzeAdImageSchema,
  analyze_ad_video: AnalyzeAdVideoSchema,
  analyze_ad_videos_batch: AnalyzeAdVideosBatchSchema,
  get_cache_stats: GetCacheStatsSchema,
  search_cached_media: SearchCachedMediaSchema,
  cleanup_media_cache: CleanupMediaCacheSchema,
};

export type ToolName = keyof typeof toolSchemas;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolSchemas, name);
}
