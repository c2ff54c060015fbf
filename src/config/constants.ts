export const TIMEOUT = {
  DEFAULT_DECODER_TIMEOUT_MS: 10000,
  DNS_LOOKUP_TIMEOUT_MS: 5000,
  DEFAULT_RATE_LIMIT_DELAY_MS: 500,
  DEFAULT_RETRY_BASE_DELAY_MS: 200,
} as const;

export const LIMITS = {
  MAX_URL_LENGTH: 2000,
  DEFAULT_MAX_REDIRECTS: 10,
  DEFAULT_DECODER_RETRIES: 3,
  LEGACY_ID_MAX_LENGTH: 150,
} as const;

export const BACKOFF = {
  DEFAULT_MAX_RETRIES: 3,
  DEFAULT_BASE_SECONDS: 60,
  DEFAULT_MAX_JITTER_SECONDS: 10,
} as const;

export const DEFAULT_WRAPPER_HOSTS = ['news.google.com'] as const;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
