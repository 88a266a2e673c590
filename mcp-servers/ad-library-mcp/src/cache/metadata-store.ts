import Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';
import {
  analysisPayloadSchema,
  deriveAnalysisFields,
  type AnalysisPayload,
} from './analysis-fields.js';
import { describeError } from './errors.js';
import type {
  CacheEntry,
  CacheSearchFilters,
  CacheStats,
  EvictedRecord,
  KindStats,
  MediaFacts,
  MediaKind,
} from './types.js';

interface MediaCacheRow {
  key: string;
  original_url: string;
  storage_path: string;
  media_kind: string;
  content_type: string;
  size_bytes: number;
  created_at: number;
  last_accessed_at: number;
  brand_name: string | null;
  ad_id: string | null;
  analysis: string | null;
  analysis_cached_at: number | null;
  dominant_colors: string | null;
  has_people: number;
  text_elements: string | null;
  duration_seconds: number | null;
  has_audio: number | null;
}

interface TotalsRow {
  total_files: number;
  total_size_bytes: number;
  analyzed_files: number;
  unique_brands: number;
}

interface KindTotalsRow {
  media_kind: string;
  count: number;
  size_bytes: number;
  analyzed: number;
  avg_duration: number | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS media_cache (
    key TEXT PRIMARY KEY,
    original_url TEXT NOT NULL,
    storage_path TEXT NOT NULL,
    media_kind TEXT NOT NULL DEFAULT 'image' CHECK (media_kind IN ('image', 'video')),
    content_type TEXT NOT NULL,
    size_bytes INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    last_accessed_at INTEGER NOT NULL,
    brand_name TEXT,
    ad_id TEXT,
    analysis TEXT,
    analysis_cached_at INTEGER,
    dominant_colors TEXT,
    has_people INTEGER NOT NULL DEFAULT 0,
    text_elements TEXT,
    duration_seconds REAL,
    has_audio INTEGER
  );
  CREATE INDEX IF NOT EXISTS idx_media_cache_brand_name ON media_cache(brand_name);
  CREATE INDEX IF NOT EXISTS idx_media_cache_ad_id ON media_cache(ad_id);
  CREATE INDEX IF NOT EXISTS idx_media_cache_last_accessed_at ON media_cache(last_accessed_at);
  CREATE INDEX IF NOT EXISTS idx_media_cache_has_people ON media_cache(has_people);
  CREATE INDEX IF NOT EXISTS idx_media_cache_dominant_colors ON media_cache(dominant_colors);
  CREATE INDEX IF NOT EXISTS idx_media_cache_media_kind ON media_cache(media_kind);
`;

const UPSERT_SQL = `
  INSERT OR REPLACE INTO media_cache (
    key, original_url, storage_path, media_kind, content_type, size_bytes,
    created_at, last_accessed_at, brand_name, ad_id, analysis, analysis_cached_at,
    dominant_colors, has_people, text_elements, duration_seconds, has_audio
  ) VALUES (
    @key, @original_url, @storage_path, @media_kind, @content_type, @size_bytes,
    @created_at, @last_accessed_at, @brand_name, @ad_id, @analysis, @analysis_cached_at,
    @dominant_colors, @has_people, @text_elements, @duration_seconds, @has_audio
  )
`;

// Stays under SQLITE_MAX_VARIABLE_NUMBER on older SQLite builds.
const BATCH_CHUNK_SIZE = 500;

function toMediaKind(value: string): MediaKind {
  return value === 'video' ? 'video' : 'image';
}

function toFlag(value: boolean | undefined): number | null {
  if (value === undefined) return null;
  return value ? 1 : 0;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function roundMb(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

function parseStringList(raw: string | null, key: string, column: string): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error('expected a JSON array');
    }
    return parsed.filter((value): value is string => typeof value === 'string');
  } catch (error) {
    logger.warn('Ignoring corrupt media cache column', { key, column, message: describeError(error) });
    return [];
  }
}

function parseAnalysis(raw: string | null, key: string): AnalysisPayload | undefined {
  if (raw === null) return undefined;
  try {
    const parsed = analysisPayloadSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn('Ignoring malformed cached analysis', { key, issues: parsed.error.issues.length });
  } catch (error) {
    logger.warn('Ignoring corrupt cached analysis', { key, message: describeError(error) });
  }
  return undefined;
}

// Counts rows whose analysis reads back as a JSON object, matching rowToEntry.
const READABLE_ANALYSIS_COUNT =
  "COALESCE(SUM(CASE WHEN json_valid(analysis) THEN json_type(analysis) = 'object' ELSE 0 END), 0)";

function rowToEntry(row: MediaCacheRow): CacheEntry {
  const analysis = parseAnalysis(row.analysis, row.key);
  const entry: CacheEntry = {
    key: row.key,
    originalUrl: row.original_url,
    storagePath: row.storage_path,
    mediaKind: toMediaKind(row.media_kind),
    contentType: row.content_type,
    sizeBytes: row.size_bytes,
    createdAt: new Date(row.created_at),
    lastAccessedAt: new Date(row.last_accessed_at),
    dominantColors: parseStringList(row.dominant_colors, row.key, 'dominant_colors'),
    hasPeople: row.has_people === 1,
    textElements: parseStringList(row.text_elements, row.key, 'text_elements'),
  };

  if (row.brand_name !== null) entry.brandName = row.brand_name;
  if (row.ad_id !== null) entry.adId = row.ad_id;
  if (analysis) {
    entry.analysis = analysis;
    if (row.analysis_cached_at !== null) entry.analysisCachedAt = new Date(row.analysis_cached_at);
  }
  if (row.duration_seconds !== null) entry.durationSeconds = row.duration_seconds;
  if (row.has_audio !== null) entry.hasAudio = row.has_audio === 1;
  return entry;
}

function entryToRow(entry: CacheEntry): MediaCacheRow {
  return {
    key: entry.key,
    original_url: entry.originalUrl,
    storage_path: entry.storagePath,
    media_kind: entry.mediaKind,
    content_type: entry.contentType,
    size_bytes: entry.sizeBytes,
    created_at: entry.createdAt.getTime(),
    last_accessed_at: entry.lastAccessedAt.getTime(),
    brand_name: entry.brandName ?? null,
    ad_id: entry.adId ?? null,
    analysis: entry.analysis ? JSON.stringify(entry.analysis) : null,
    analysis_cached_at: entry.analysis && entry.analysisCachedAt ? entry.analysisCachedAt.getTime() : null,
    dominant_colors: entry.dominantColors.length > 0 ? JSON.stringify(entry.dominantColors) : null,
    has_people: entry.hasPeople ? 1 : 0,
    text_elements: entry.textElements.length > 0 ? JSON.stringify(entry.textElements) : null,
    duration_seconds: entry.durationSeconds ?? null,
    has_audio: toFlag(entry.hasAudio),
  };
}

function emptyKindStats(): KindStats {
  return { count: 0, sizeBytes: 0, analyzed: 0 };
}

/**
 * SQLite-backed index of cached media. One row per cache key.
 * Writers are serialised by SQLite's file lock; reads run under WAL.
 */
export class MetadataStore {
  private readonly db: Database.Database;

  constructor(databasePath: string) {
    this.db = new Database(databasePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA);
  }

  get(key: string, kindFilter?: MediaKind): CacheEntry | null {
    const row = kindFilter
      ? this.db
          .prepare<[string, string], MediaCacheRow>('SELECT * FROM media_cache WHERE key = ? AND media_kind = ?')
          .get(key, kindFilter)
      : this.db.prepare<[string], MediaCacheRow>('SELECT * FROM media_cache WHERE key = ?').get(key);
    return row ? rowToEntry(row) : null;
  }

  getBatch(keys: string[], kindFilter?: MediaKind): Map<string, CacheEntry | null> {
    const result = new Map<string, CacheEntry | null>();
    for (const key of keys) {
      result.set(key, null);
    }
    const uniqueKeys = [...result.keys()];
    if (uniqueKeys.length === 0) return result;

    const readAll = this.db.transaction(() => {
      for (const group of chunk(uniqueKeys, BATCH_CHUNK_SIZE)) {
        const placeholders = group.map(() => '?').join(', ');
        const params: string[] = [...group];
        let sql = `SELECT * FROM media_cache WHERE key IN (${placeholders})`;
        if (kindFilter) {
          sql += ' AND media_kind = ?';
          params.push(kindFilter);
        }
        for (const row of this.db.prepare<string[], MediaCacheRow>(sql).all(...params)) {
          result.set(row.key, rowToEntry(row));
        }
      }
    });
    readAll();
    return result;
  }

  put(entry: CacheEntry): void {
    this.db.prepare(UPSERT_SQL).run(entryToRow(entry));
  }

  /** Writes every entry it can inside one transaction and returns the keys written. */
  putBatch(entries: CacheEntry[]): string[] {
    const statement = this.db.prepare(UPSERT_SQL);
    const written: string[] = [];
    const writeAll = this.db.transaction((batch: CacheEntry[]) => {
      for (const entry of batch) {
        try {
          statement.run(entryToRow(entry));
          written.push(entry.key);
        } catch (error) {
          logger.error('Failed to write media cache row', {
            key: entry.key,
            url: entry.originalUrl,
            message: describeError(error),
          });
        }
      }
    });
    writeAll(entries);
    return written;
  }

  updateAnalysis(key: string, analysis: AnalysisPayload, cachedAt: Date, facts: MediaFacts = {}): boolean {
    const derived = deriveAnalysisFields(analysis);
    const info = this.db
      .prepare(
        `UPDATE media_cache
         SET analysis = @analysis,
             analysis_cached_at = @analysis_cached_at,
             dominant_colors = @dominant_colors,
             has_people = @has_people,
             text_elements = @text_elements,
             duration_seconds = COALESCE(@duration_seconds, duration_seconds),
             has_audio = COALESCE(@has_audio, has_audio)
         WHERE key = @key`
      )
      .run({
        key,
        analysis: JSON.stringify(analysis),
        analysis_cached_at: cachedAt.getTime(),
        dominant_colors: derived.dominantColors.length > 0 ? JSON.stringify(derived.dominantColors) : null,
        has_people: derived.hasPeople ? 1 : 0,
        text_elements: derived.textElements.length > 0 ? JSON.stringify(derived.textElements) : null,
        duration_seconds: facts.durationSeconds ?? null,
        has_audio: toFlag(facts.hasAudio),
      });
    return info.changes > 0;
  }

  search(filters: CacheSearchFilters = {}): CacheEntry[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filters.brandName) {
      clauses.push('brand_name = ?');
      params.push(filters.brandName);
    }
    if (filters.hasPeople !== undefined) {
      clauses.push('has_people = ?');
      params.push(filters.hasPeople ? 1 : 0);
    }
    if (filters.colorContains) {
      clauses.push("dominant_colors LIKE ? ESCAPE '\\'");
      params.push(`%${escapeLike(filters.colorContains)}%`);
    }
    if (filters.mediaKind) {
      clauses.push('media_kind = ?');
      params.push(filters.mediaKind);
    }

    let sql = 'SELECT * FROM media_cache';
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(' AND ')}`;
    }
    sql += ' ORDER BY last_accessed_at DESC, key ASC';
    if (filters.limit !== undefined && filters.limit > 0) {
      sql += ' LIMIT ?';
      params.push(Math.floor(filters.limit));
    }

    return this.db
      .prepare<Array<string | number>, MediaCacheRow>(sql)
      .all(...params)
      .map(rowToEntry);
  }

  listOlderThan(cutoff: Date): EvictedRecord[] {
    return this.db
      .prepare<[number], Pick<MediaCacheRow, 'key' | 'storage_path' | 'media_kind' | 'size_bytes'>>(
        'SELECT key, storage_path, media_kind, size_bytes FROM media_cache WHERE created_at < ? ORDER BY created_at, key'
      )
      .all(cutoff.getTime())
      .map((row) => ({
        key: row.key,
        storagePath: row.storage_path,
        mediaKind: toMediaKind(row.media_kind),
        sizeBytes: row.size_bytes,
      }));
  }

  /** Deletes a row only while it still points at `storagePath`. */
  delete(key: string, storagePath: string): boolean {
    return (
      this.db.prepare('DELETE FROM media_cache WHERE key = ? AND storage_path = ?').run(key, storagePath).changes > 0
    );
  }

  deleteMany(records: Array<{ key: string; storagePath: string }>): number {
    const statement = this.db.prepare('DELETE FROM media_cache WHERE key = ? AND storage_path = ?');
    const removeAll = this.db.transaction((batch: Array<{ key: string; storagePath: string }>) => {
      let removed = 0;
      for (const record of batch) {
        removed += statement.run(record.key, record.storagePath).changes;
      }
      return removed;
    });
    return removeAll(records);
  }

  touch(key: string, at: Date): void {
    this.db
      .prepare('UPDATE media_cache SET last_accessed_at = MAX(last_accessed_at, ?) WHERE key = ?')
      .run(at.getTime(), key);
  }

  touchMany(keys: string[], at: Date): void {
    const statement = this.db.prepare(
      'UPDATE media_cache SET last_accessed_at = MAX(last_accessed_at, ?) WHERE key = ?'
    );
    const touchAll = this.db.transaction((batch: string[]) => {
      for (const key of batch) {
        statement.run(at.getTime(), key);
      }
    });
    touchAll(keys);
  }

  stats(): CacheStats {
    const totals = this.db
      .prepare<[], TotalsRow>(
        `SELECT COUNT(*) AS total_files,
                COALESCE(SUM(size_bytes), 0) AS total_size_bytes,
                ${READABLE_ANALYSIS_COUNT} AS analyzed_files,
                COUNT(DISTINCT brand_name) AS unique_brands
         FROM media_cache`
      )
      .get();
    const perKind = this.db
      .prepare<[], KindTotalsRow>(
        `SELECT media_kind,
                COUNT(*) AS count,
                COALESCE(SUM(size_bytes), 0) AS size_bytes,
                ${READABLE_ANALYSIS_COUNT} AS analyzed,
                AVG(duration_seconds) AS avg_duration
         FROM media_cache
         GROUP BY media_kind`
      )
      .all();

    const images = emptyKindStats();
    const videos: CacheStats['videos'] = { ...emptyKindStats(), avgDurationSeconds: null };
    for (const row of perKind) {
      const target = toMediaKind(row.media_kind) === 'video' ? videos : images;
      target.count = row.count;
      target.sizeBytes = row.size_bytes;
      target.analyzed = row.analyzed;
      if (target === videos) {
        videos.avgDurationSeconds = row.avg_duration;
      }
    }

    const totalSizeBytes = totals?.total_size_bytes ?? 0;
    return {
      totalFiles: totals?.total_files ?? 0,
      totalSizeBytes,
      totalSizeMb: roundMb(totalSizeBytes),
      analyzedFiles: totals?.analyzed_files ?? 0,
      uniqueBrands: totals?.unique_brands ?? 0,
      images,
      videos,
    };
  }

  close(): void {
    this.db.close();
  }
}
