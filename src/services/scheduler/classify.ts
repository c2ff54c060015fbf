import type {
  FailureClass,
  ResolutionFailure,
} from '../../types/resolution.js';
import { failureFromMessage } from '../failures.js';

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([
  429, 502, 503, 504,
]);

function assertNever(value: never): never {
  throw new Error(`Unhandled failure kind: ${JSON.stringify(value)}`);
}

/**
 * Decides whether a failed resolution is worth another attempt. Free-text
 * messages are parsed first; text that matches no known pattern is treated
 * as permanent.
 */
export function classifyFailure(
  failure: ResolutionFailure | string
): FailureClass {
  const parsed =
    typeof failure === 'string' ? failureFromMessage(failure) : failure;

  switch (parsed.kind) {
    case 'timeout':
    case 'network':
    case 'rate-limited':
      return 'retryable';
    case 'http-status':
      return RETRYABLE_STATUSES.has(parsed.status) ? 'retryable' : 'permanent';
    case 'invalid-input':
    case 'malformed-payload':
    case 'no-redirect':
    case 'too-many-redirects':
    case 'blocked':
    case 'no-content':
    case 'unclassified':
      return 'permanent';
    default:
      return assertNever(parsed);
  }
}
