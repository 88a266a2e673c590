import { z } from 'zod';
import { logger } from '../utils/logger.js';

export type AdMediaType = 'IMAGE' | 'VIDEO' | 'DCO';

export interface ParsedUrl {
  fullUrl: string;
  baseUrl: string;
  domain: string | null;
  utmParams: Record<string, string>;
  allParams: Record<string, string | string[]>;
  isInternal: boolean;
  hasUtm: boolean;
  parseError?: string;
}

export interface AdRecord {
  adId: string;
  startDate?: string;
  endDate?: string;
  mediaUrl: string;
  mediaType: AdMediaType;
  body: string;
  title: string;
  destinationUrls: ParsedUrl[];
  externalUrls: ParsedUrl[];
  internalUrls: ParsedUrl[];
  hasExternalLinks: boolean;
  utmParams: Record<string, string>;
  domains: string[];
  pageId?: string;
  pageName?: string;
}

export interface ParseAdsOptions {
  filterInactive: boolean;
  now?: Date;
}

const TRACKING_PARAM_KEYS = [
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'utm_id',
  'utm_source_platform',
  'fbclid',
  'gclid',
];

// Subdomains match through the suffix check in isInternalDomain.
const INTERNAL_BASE_DOMAINS = new Set([
  'facebook.com',
  'fb.com',
  'fbcdn.net',
  'facebook.net',
  'instagram.com',
  'ig.com',
  'messenger.com',
  'whatsapp.com',
  'wa.me',
  'whatsapp.net',
  'meta.com',
  'oculus.com',
  'threads.net',
  'google.com',
  'googleapis.com',
  'googleusercontent.com',
  'googletagmanager.com',
  'youtube.com',
  'youtu.be',
  'ytimg.com',
  'doubleclick.net',
  'googleadservices.com',
  'googlesyndication.com',
]);

const LINK_FIELDS = ['link_url', 'cta_url', 'website_url', 'destination_url', 'landing_page_url', 'click_url'];

const BODY_URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+[^\s<>"{}|\\^`[\].,;:!?]/g;

const textField = z
  .union([z.string(), z.object({ text: z.string().nullish() }).passthrough()])
  .nullish();

const rawCardSchema = z
  .object({
    resized_image_url: z.string().nullish(),
    original_image_url: z.string().nullish(),
    video_preview_image_url: z.string().nullish(),
    body: textField,
    title: textField,
  })
  .passthrough();

const rawSnapshotSchema = z
  .object({
    display_format: z.string().nullish(),
    body: textField,
    title: textField,
    images: z.array(z.object({ resized_image_url: z.string().nullish() }).passthrough()).nullish(),
    videos: z.array(z.object({ video_sd_url: z.string().nullish() }).passthrough()).nullish(),
    cards: z.array(rawCardSchema).nullish(),
  })
  .passthrough();

const rawAdSchema = z
  .object({
    ad_archive_id: z.union([z.string(), z.number()]).nullish(),
    start_date: z.number().nullish(),
    end_date: z.number().nullish(),
    page_id: z.union([z.string(), z.number()]).nullish(),
    page_name: z.string().nullish(),
    snapshot: rawSnapshotSchema.nullish(),
  })
  .passthrough();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textOf(field: unknown): string | undefined {
  if (typeof field === 'string') return field;
  if (isRecord(field) && typeof field.text === 'string') return field.text;
  return undefined;
}

function isInternalDomain(domain: string): boolean {
  for (const base of INTERNAL_BASE_DOMAINS) {
    if (domain === base || domain.endsWith(`.${base}`)) return true;
  }
  return false;
}

function epochSecondsToIso(value: number | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  return new Date(value * 1000).toISOString();
}

export function parseUrlUtmParams(url: string): ParsedUrl {
  try {
    const parsed = new URL(url);
    const domain = parsed.host ? parsed.host.toLowerCase() : null;

    const allParams: Record<string, string | string[]> = {};
    for (const name of new Set(parsed.searchParams.keys())) {
      const values = parsed.searchParams.getAll(name);
      allParams[name] = values.length === 1 ? values[0] : values;
    }

    const utmParams: Record<string, string> = {};
    for (const key of TRACKING_PARAM_KEYS) {
      const value = parsed.searchParams.get(key);
      if (value !== null) utmParams[key] = value;
    }

    return {
      fullUrl: url,
      baseUrl: domain ? `${parsed.protocol}//${parsed.host}${parsed.pathname}` : url.split('?')[0],
      domain,
      utmParams,
      allParams,
      isInternal: domain ? isInternalDomain(domain) : false,
      hasUtm: Object.keys(utmParams).length > 0,
    };
  } catch (error) {
    logger.warn('Failed to parse destination URL', { url });
    return {
      fullUrl: url,
      baseUrl: url.split('?')[0],
      domain: null,
      utmParams: {},
      allParams: {},
      isInternal: false,
      hasUtm: false,
      parseError: error instanceof Error ? error.message : String(error),
    };
  }
}

function collectLinkFields(source: unknown, into: string[]): void {
  if (!isRecord(source)) return;
  for (const field of LINK_FIELDS) {
    const value = source[field];
    if (typeof value === 'string' && value.trim()) {
      into.push(value.trim());
    }
  }
}

/** Destination URLs found in an ad snapshot, de-duplicated in discovery order. */
export function extractSnapshotUrls(snapshot: Record<string, unknown>): string[] {
  const urls: string[] = [];
  collectLinkFields(snapshot, urls);

  const callToAction = snapshot.call_to_action;
  if (isRecord(callToAction)) {
    collectLinkFields(callToAction, urls);
    collectLinkFields(callToAction.link, urls);
  }

  const outboundLinks = snapshot.outbound_links;
  if (Array.isArray(outboundLinks)) {
    for (const link of outboundLinks) {
      if (typeof link === 'string' && link.trim()) {
        urls.push(link.trim());
      } else {
        collectLinkFields(link, urls);
      }
    }
  }

  const bodyText = textOf(snapshot.body);
  if (bodyText) {
    urls.push(...(bodyText.match(BODY_URL_PATTERN) ?? []));
  }

  return [...new Set(urls)];
}

interface MediaSlot {
  mediaUrl: string;
  body?: string;
  title?: string;
}

function mediaSlots(snapshot: z.infer<typeof rawSnapshotSchema>, mediaType: AdMediaType): MediaSlot[] {
  if (mediaType === 'IMAGE') {
    const url = snapshot.images?.[0]?.resized_image_url;
    return url ? [{ mediaUrl: url }] : [];
  }
  if (mediaType === 'VIDEO') {
    const url = snapshot.videos?.[0]?.video_sd_url;
    return url ? [{ mediaUrl: url }] : [];
  }

  const slots: MediaSlot[] = [];
  for (const card of snapshot.cards ?? []) {
    const url = card.resized_image_url || card.original_image_url || card.video_preview_image_url;
    if (url) {
      slots.push({ mediaUrl: url, body: textOf(card.body), title: textOf(card.title) });
    }
  }
  return slots;
}

function isAdMediaType(value: string | null | undefined): value is AdMediaType {
  return value === 'IMAGE' || value === 'VIDEO' || value === 'DCO';
}

/**
 * Flattens ad-library results into one record per media URL. Ads without an
 * archive id, a supported display format, or any media are skipped.
 */
export function parseAds(results: unknown[], options: ParseAdsOptions): AdRecord[] {
  const now = options.now ?? new Date();
  const ads: AdRecord[] = [];

  for (const raw of results) {
    const parsed = rawAdSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Skipping malformed ad', { issues: parsed.error.issues.length });
      continue;
    }
    const ad = parsed.data;
    if (ad.ad_archive_id === null || ad.ad_archive_id === undefined || ad.ad_archive_id === '') continue;

    const endDate = epochSecondsToIso(ad.end_date);
    if (options.filterInactive && endDate && new Date(endDate).getTime() < now.getTime()) {
      continue;
    }

    const snapshot = ad.snapshot;
    if (!snapshot || !isAdMediaType(snapshot.display_format)) continue;
    const mediaType = snapshot.display_format;

    const slots = mediaSlots(snapshot, mediaType);
    if (slots.length === 0) continue;

    const destinationUrls = extractSnapshotUrls(snapshot).map(parseUrlUtmParams);
    const externalUrls = destinationUrls.filter((url) => !url.isInternal);
    const internalUrls = destinationUrls.filter((url) => url.isInternal);
    const utmParams: Record<string, string> = {};
    for (const url of destinationUrls) {
      Object.assign(utmParams, url.utmParams);
    }
    const domains = [
      ...new Set(destinationUrls.map((url) => url.domain).filter((domain): domain is string => Boolean(domain))),
    ];
    const adBody = textOf(snapshot.body) ?? '';
    const adTitle = textOf(snapshot.title) ?? '';

    for (const slot of slots) {
      const record: AdRecord = {
        adId: String(ad.ad_archive_id),
        startDate: epochSecondsToIso(ad.start_date),
        endDate,
        mediaUrl: slot.mediaUrl,
        mediaType,
        body: slot.body || adBody,
        title: slot.title || adTitle,
        destinationUrls,
        externalUrls,
        internalUrls,
        hasExternalLinks: externalUrls.length > 0,
        utmParams,
        domains,
      };
      if (ad.page_id !== null && ad.page_id !== undefined) record.pageId = String(ad.page_id);
      if (ad.page_name) record.pageName = ad.page_name;
      ads.push(record);
    }
  }

  return ads;
}
