import { readFileSync } from 'node:fs';

import {
  BACKOFF,
  DEFAULT_USER_AGENT,
  DEFAULT_WRAPPER_HOSTS,
  LIMITS,
  TIMEOUT,
} from './constants.js';
import {
  parseBoolean,
  parseInteger,
  parseList,
  parseLogLevel,
} from './env-parsers.js';

function readPackageVersion(): string {
  try {
    const raw = readFileSync(
      new URL('../../package.json', import.meta.url),
      'utf8'
    );
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && 'version' in parsed) {
      const { version } = parsed;
      if (typeof version === 'string') return version;
    }
  } catch {
    // Running from a layout without package.json next to the sources.
  }
  return '0.0.0';
}

export const config = {
  app: {
    name: 'link-unwrap',
    version: readPackageVersion(),
  },
  decoder: {
    timeoutMs: parseInteger(
      process.env.DECODER_TIMEOUT_MS,
      TIMEOUT.DEFAULT_DECODER_TIMEOUT_MS,
      1,
      120000
    ),
    maxRedirects: parseInteger(
      process.env.DECODER_MAX_REDIRECTS,
      LIMITS.DEFAULT_MAX_REDIRECTS,
      0,
      50
    ),
    rateLimitDelayMs: parseInteger(
      process.env.DECODER_RATE_LIMIT_DELAY_MS,
      TIMEOUT.DEFAULT_RATE_LIMIT_DELAY_MS,
      0,
      60000
    ),
    maxRetries: parseInteger(
      process.env.DECODER_MAX_RETRIES,
      LIMITS.DEFAULT_DECODER_RETRIES,
      1,
      10
    ),
    retryBaseDelayMs: TIMEOUT.DEFAULT_RETRY_BASE_DELAY_MS,
    userAgent: process.env.USER_AGENT ?? DEFAULT_USER_AGENT,
    wrapperHosts: parseList(process.env.WRAPPER_HOSTS, DEFAULT_WRAPPER_HOSTS),
    legacyIdMaxLength: LIMITS.LEGACY_ID_MAX_LENGTH,
  },
  retry: {
    maxRetries: parseInteger(
      process.env.RETRY_MAX_ATTEMPTS,
      BACKOFF.DEFAULT_MAX_RETRIES,
      0,
      20
    ),
    baseBackoffSeconds: parseInteger(
      process.env.RETRY_BASE_BACKOFF_SECONDS,
      BACKOFF.DEFAULT_BASE_SECONDS,
      1,
      86400
    ),
    maxJitterSeconds: parseInteger(
      process.env.RETRY_MAX_JITTER_SECONDS,
      BACKOFF.DEFAULT_MAX_JITTER_SECONDS,
      0,
      3600
    ),
  },
  logging: {
    enabled: parseBoolean(process.env.LOGGING_ENABLED, true),
    level: parseLogLevel(process.env.LOG_LEVEL),
    dir: process.env.LOG_DIR,
  },
  constants: {
    maxUrlLength: LIMITS.MAX_URL_LENGTH,
    dnsLookupTimeoutMs: TIMEOUT.DNS_LOOKUP_TIMEOUT_MS,
  },
};
