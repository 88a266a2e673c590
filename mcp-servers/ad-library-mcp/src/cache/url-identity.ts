import { createHash } from 'node:crypto';
import { InvalidInputError } from './errors.js';

export function assertValidUrl(url: unknown): string {
  if (typeof url !== 'string' || !url.trim()) {
    throw new InvalidInputError('Media URL must be a non-empty string');
  }
  return url;
}

/**
 * Cache key for a media URL: MD5 of the UTF-8 bytes, hex encoded.
 * The URL is hashed as given; callers trim before calling when they need to.
 */
export function identifyUrl(url: string): string {
  return createHash('md5').update(assertValidUrl(url), 'utf8').digest('hex');
}
