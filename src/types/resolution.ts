export type EncodingVariant = 'legacy-embedded' | 'redirect-based';

/**
 * Every way a resolution attempt can fail. Produced by the decoding layer
 * and consumed by the retry scheduler, which matches on `kind`.
 */
export type ResolutionFailure =
  | { readonly kind: 'invalid-input'; readonly reason: string }
  | { readonly kind: 'malformed-payload'; readonly reason: string }
  | { readonly kind: 'timeout'; readonly timeoutMs?: number }
  | { readonly kind: 'network'; readonly message: string; readonly code?: string }
  | { readonly kind: 'http-status'; readonly status: number }
  | { readonly kind: 'rate-limited'; readonly retryAfterSeconds?: number }
  | { readonly kind: 'no-redirect' }
  | { readonly kind: 'too-many-redirects'; readonly limit: number }
  | { readonly kind: 'blocked'; readonly reason: string }
  | { readonly kind: 'no-content' }
  | { readonly kind: 'unclassified'; readonly message: string };

export type FailureClass = 'retryable' | 'permanent';

export interface ResolvedOutcome {
  readonly status: 'resolved';
  readonly url: string;
  readonly variant: EncodingVariant;
}

export interface BlockedOutcome {
  readonly status: 'blocked';
  readonly reason: string;
  readonly url?: string;
}

export interface FailedOutcome {
  readonly status: 'failed';
  readonly failure: ResolutionFailure;
  readonly message: string;
}

export type ResolutionOutcome = ResolvedOutcome | BlockedOutcome | FailedOutcome;

export interface LinkDecoder {
  decode(wrappedLink: string): Promise<ResolutionOutcome>;
}
