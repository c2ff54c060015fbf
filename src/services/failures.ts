import type { ResolutionFailure } from '../types/resolution.js';

export function describeFailure(failure: ResolutionFailure): string {
  switch (failure.kind) {
    case 'invalid-input':
      return `Invalid URL: ${failure.reason}`;
    case 'malformed-payload':
      return `Malformed payload: ${failure.reason}`;
    case 'timeout':
      return failure.timeoutMs === undefined
        ? 'Request timeout'
        : `Request timeout after ${failure.timeoutMs}ms`;
    case 'network':
      return `Network error: ${failure.message}`;
    case 'http-status':
      return `HTTP ${failure.status}`;
    case 'rate-limited':
      return 'HTTP 429: rate limited';
    case 'no-redirect':
      return 'No redirect occurred for wrapped link';
    case 'too-many-redirects':
      return `Too many redirects (limit ${failure.limit})`;
    case 'blocked':
      return `SSRF blocked: ${failure.reason}`;
    case 'no-content':
      return 'No parseable content';
    case 'unclassified':
      return failure.message;
  }
}

interface MessagePattern {
  readonly pattern: RegExp;
  readonly toFailure: (message: string) => ResolutionFailure;
}

// Permanent patterns are listed first so they win over retryable ones.
const MESSAGE_PATTERNS: readonly MessagePattern[] = [
  {
    pattern: /\bnot found\b|\b404\b/i,
    toFailure: () => ({ kind: 'http-status', status: 404 }),
  },
  {
    pattern: /\bforbidden\b|\b403\b/i,
    toFailure: () => ({ kind: 'http-status', status: 403 }),
  },
  {
    pattern: /invalid url/i,
    toFailure: (message) => ({ kind: 'invalid-input', reason: message }),
  },
  {
    pattern: /ssrf|blocked/i,
    toFailure: (message) => ({ kind: 'blocked', reason: message }),
  },
  {
    pattern: /parseable content/i,
    toFailure: () => ({ kind: 'no-content' }),
  },
  {
    pattern: /timeout|timed out/i,
    toFailure: () => ({ kind: 'timeout' }),
  },
  {
    pattern: /\b429\b|rate limit/i,
    toFailure: () => ({ kind: 'rate-limited' }),
  },
  {
    pattern: /\b50[234]\b/,
    toFailure: (message) => ({
      kind: 'http-status',
      status: Number.parseInt(/\b(50[234])\b/.exec(message)?.[1] ?? '503', 10),
    }),
  },
  {
    pattern: /connection|network|dns/i,
    toFailure: (message) => ({ kind: 'network', message }),
  },
];

/**
 * Maps free-text error descriptions from collaborators outside the decoder
 * onto the failure variants.
 */
export function failureFromMessage(message: string): ResolutionFailure {
  for (const { pattern, toFailure } of MESSAGE_PATTERNS) {
    if (pattern.test(message)) return toFailure(message);
  }
  return { kind: 'unclassified', message };
}
