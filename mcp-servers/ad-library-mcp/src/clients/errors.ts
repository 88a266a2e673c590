export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MediaFetchError extends Error {
  readonly code = 'MEDIA_FETCH_FAILED';
  readonly url: string;
  readonly status?: number;

  constructor(message: string, options: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'MediaFetchError';
    this.url = options.url;
    this.status = options.status;
  }
}

export class InvalidMediaError extends Error {
  readonly code = 'INVALID_MEDIA';
  readonly contentType: string;

  constructor(message: string, contentType: string) {
    super(message);
    this.name = 'InvalidMediaError';
    this.contentType = contentType;
  }
}

export class AdLibraryApiError extends Error {
  readonly code: string = 'AD_LIBRARY_API_ERROR';
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'AdLibraryApiError';
    this.status = status;
  }
}

export class CreditExhaustedError extends AdLibraryApiError {
  readonly code = 'CREDITS_EXHAUSTED';
  readonly topUpUrl = 'https://scrapecreators.com/dashboard';

  constructor(message: string, status?: number) {
    super(message, status);
    this.name = 'CreditExhaustedError';
  }
}

export class RateLimitError extends AdLibraryApiError {
  readonly code = 'RATE_LIMITED';
  readonly retryAfterSeconds?: number;

  constructor(message: string, retryAfterSeconds?: number) {
    super(message, 429);
    this.name = 'RateLimitError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class MediaAnalysisError extends Error {
  readonly code = 'MEDIA_ANALYSIS_FAILED';

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'MediaAnalysisError';
  }
}
