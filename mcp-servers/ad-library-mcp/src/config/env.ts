import dotenv from 'dotenv';
import os from 'node:os';
import path from 'node:path';

export interface MediaCacheConfig {
  rootDir: string;
  maxAgeDays: number;
}

export interface HttpTimeoutConfig {
  defaultMs: number;
  videoMs: number;
}

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  httpTransportEnabled: boolean;
  scrapeCreatorsApiKey?: string;
  geminiApiKey?: string;
  geminiModel: string;
  mediaCache: MediaCacheConfig;
  timeouts: HttpTimeoutConfig;
}

type EnvSource = Record<string, string | undefined>;

let envLoaded = false;
let cachedConfig: EnvConfig | null = null;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

function optionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function defaultCacheDir(): string {
  return path.join(os.homedir(), '.cache', 'ad-library-mcp');
}

export function buildEnvConfig(source: EnvSource): EnvConfig {
  return {
    nodeEnv: source.NODE_ENV || 'development',
    port: parsePositiveInt(source.PORT, 3002),
    logLevel: source.LOG_LEVEL || 'info',
    httpTransportEnabled: parseBoolean(source.HTTP_TRANSPORT_ENABLED, false),
    scrapeCreatorsApiKey: optionalString(source.SCRAPECREATORS_API_KEY),
    geminiApiKey: optionalString(source.GEMINI_API_KEY),
    geminiModel: optionalString(source.GEMINI_MODEL) ?? 'gemini-2.5-flash',
    mediaCache: {
      rootDir: optionalString(source.MEDIA_CACHE_DIR) ?? defaultCacheDir(),
      maxAgeDays: parsePositiveInt(source.MEDIA_CACHE_MAX_AGE_DAYS, 30),
    },
    timeouts: {
      defaultMs: parsePositiveInt(source.HTTP_TIMEOUT_MS, 30_000),
      videoMs: parsePositiveInt(source.VIDEO_TIMEOUT_MS, 60_000),
    },
  };
}

export function loadEnvConfig(): EnvConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  if (!envLoaded) {
    dotenv.config();
    envLoaded = true;
  }

  cachedConfig = buildEnvConfig(process.env);
  return cachedConfig;
}
