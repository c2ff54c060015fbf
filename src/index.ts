export {
  AppError,
  DecodeError,
  NotFoundError,
  RetryStateConflictError,
  SecurityRejectionError,
  ValidationError,
} from './errors/app-error.js';
export {
  type DecoderOptions,
  decoderOptionsSchema,
  type RetryPolicyConfig,
  retryPolicySchema,
} from './schemas/options.js';
export {
  decode,
  isLegacyEncoding,
  WrapperDecoder,
  type WrapperDecoderDeps,
} from './services/decoder.js';
export { detectVariant, extractArticleId } from './services/decoder/format.js';
export { extractUrlFromPayload } from './services/decoder/payload.js';
export { describeFailure, failureFromMessage } from './services/failures.js';
export {
  IntervalSpacer,
  type RequestSpacer,
} from './services/fetcher/rate-limiter.js';
export { computeBackoff } from './services/scheduler/backoff.js';
export { classifyFailure } from './services/scheduler/classify.js';
export {
  ResolutionRetryScheduler,
  type SchedulerDeps,
} from './services/scheduler/scheduler.js';
export {
  type AttemptResult,
  initialRetryState,
  type RetryState,
  type ScheduleDecision,
  transitionRetryState,
} from './services/scheduler/transition.js';
export {
  RetryWorker,
  type RetryRunSummary,
} from './services/scheduler/worker.js';
export type {
  ArticleRef,
  ArticleStore,
} from './services/store/article-store.js';
export { InMemoryArticleStore } from './services/store/in-memory-store.js';
export type {
  EncodingVariant,
  LinkDecoder,
  ResolutionFailure,
  ResolutionOutcome,
} from './types/resolution.js';
export {
  IpRangeGuard,
  ipInRange,
  isBlockedIp,
  parseCidr,
} from './utils/ip-address.js';
export {
  type HostResolver,
  UrlSafetyValidator,
  validateOutboundUrl,
} from './utils/url-validator.js';
