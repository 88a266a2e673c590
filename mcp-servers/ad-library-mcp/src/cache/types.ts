import type { AnalysisPayload } from './analysis-fields.js';

export type MediaKind = 'image' | 'video';

export interface CacheEntry {
  key: string;
  originalUrl: string;
  storagePath: string;
  mediaKind: MediaKind;
  contentType: string;
  sizeBytes: number;
  createdAt: Date;
  lastAccessedAt: Date;
  brandName?: string;
  adId?: string;
  analysis?: AnalysisPayload;
  analysisCachedAt?: Date;
  dominantColors: string[];
  hasPeople: boolean;
  textElements: string[];
  durationSeconds?: number;
  hasAudio?: boolean;
}

export interface PutMediaInput {
  url: string;
  bytes: Buffer;
  contentType: string;
  mediaKind: MediaKind;
  brandName?: string;
  adId?: string;
  analysis?: AnalysisPayload;
  durationSeconds?: number;
  hasAudio?: boolean;
}

/** Facts about a video learned from its analysis. */
export interface MediaFacts {
  durationSeconds?: number;
  hasAudio?: boolean;
}

export interface CacheSearchFilters {
  brandName?: string;
  hasPeople?: boolean;
  colorContains?: string;
  mediaKind?: MediaKind;
  limit?: number;
}

export interface EvictedRecord {
  key: string;
  storagePath: string;
  mediaKind: MediaKind;
  sizeBytes: number;
}

export interface KindStats {
  count: number;
  sizeBytes: number;
  analyzed: number;
}

export interface CacheStats {
  totalFiles: number;
  totalSizeBytes: number;
  totalSizeMb: number;
  analyzedFiles: number;
  uniqueBrands: number;
  images: KindStats;
  videos: KindStats & { avgDurationSeconds: number | null };
}

export interface EvictionReport {
  maxAgeDays: number;
  cutoff: Date;
  filesRemoved: number;
  bytesFreed: number;
  perKind: Record<MediaKind, { count: number; bytes: number }>;
}
