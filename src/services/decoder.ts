import type { AxiosInstance } from 'axios';

import { DecodeError } from '../errors/app-error.js';
import {
  type DecoderOptions,
  resolveDecoderOptions,
} from '../schemas/options.js';
import type {
  EncodingVariant,
  LinkDecoder,
  ResolutionOutcome,
} from '../types/resolution.js';
import type { Sleep } from '../utils/timer-utils.js';
import { UrlSafetyValidator } from '../utils/url-validator.js';
import {
  detectVariant,
  extractArticleId,
  isWrapperHost,
} from './decoder/format.js';
import { decodeLegacyLink } from './decoder/payload.js';
import { IntervalSpacer, type RequestSpacer } from './fetcher/rate-limiter.js';
import { RedirectFollower } from './fetcher/redirects.js';
import { RetryPolicy } from './fetcher/retry-policy.js';
import { logDebug } from './logger.js';
import { resolvedOutcome, toOutcome } from './outcomes.js';

export interface WrapperDecoderDeps {
  validator?: UrlSafetyValidator;
  spacer?: RequestSpacer;
  client?: AxiosInstance;
  sleep?: Sleep;
}

interface Resolution {
  readonly url: string;
  readonly variant: EncodingVariant;
}

/**
 * Recovers the destination URL behind a wrapped aggregator link. Legacy
 * links are decoded offline; newer ones are resolved by following the
 * wrapper's redirects. Every candidate passes the outbound safety check
 * before it is returned.
 */
export class WrapperDecoder implements LinkDecoder {
  readonly options: DecoderOptions;
  private readonly validator: UrlSafetyValidator;
  private readonly spacer: RequestSpacer;
  private readonly follower: RedirectFollower;
  private readonly sleep: Sleep | undefined;

  constructor(
    options: Partial<DecoderOptions> = {},
    deps: WrapperDecoderDeps = {}
  ) {
    this.options = resolveDecoderOptions(options);
    this.validator = deps.validator ?? new UrlSafetyValidator();
    this.spacer =
      deps.spacer ?? new IntervalSpacer(this.options.rateLimitDelayMs);
    this.sleep = deps.sleep;
    this.follower = new RedirectFollower({
      timeoutMs: this.options.timeoutMs,
      maxRedirects: this.options.maxRedirects,
      userAgent: this.options.userAgent,
      preflight: (url) => this.validator.validate(url),
      ...(deps.client ? { client: deps.client } : {}),
    });
  }

  detectVariant(wrappedLink: string): EncodingVariant {
    return detectVariant(wrappedLink, this.options.legacyIdMaxLength);
  }

  isLegacyEncoding(wrappedLink: string): boolean {
    return this.detectVariant(wrappedLink) === 'legacy-embedded';
  }

  /** Never rejects; every failure is reported in the outcome. */
  async decode(wrappedLink: string): Promise<ResolutionOutcome> {
    try {
      const { url, variant } = await this.run(wrappedLink);
      return resolvedOutcome(url, variant);
    } catch (error) {
      return toOutcome(error, wrappedLink);
    }
  }

  async resolve(wrappedLink: string): Promise<string> {
    const { url } = await this.run(wrappedLink);
    return url;
  }

  private async run(wrappedLink: string): Promise<Resolution> {
    this.assertWrappedLink(wrappedLink);

    const variant = this.detectVariant(wrappedLink);
    const candidate =
      variant === 'legacy-embedded'
        ? this.decodeLegacy(wrappedLink)
        : await this.followRedirects(wrappedLink);

    await this.validator.validate(candidate);
    logDebug('Wrapped link resolved', { wrappedLink, variant, url: candidate });
    return { url: candidate, variant };
  }

  private assertWrappedLink(wrappedLink: string): void {
    if (!wrappedLink.trim()) {
      throw new DecodeError(
        { kind: 'invalid-input', reason: 'Link is empty' },
        wrappedLink
      );
    }
    if (!isWrapperHost(wrappedLink, this.options.wrapperHosts)) {
      throw new DecodeError(
        {
          kind: 'invalid-input',
          reason: `Not a wrapped link: ${wrappedLink}`,
        },
        wrappedLink
      );
    }
  }

  private decodeLegacy(wrappedLink: string): string {
    const articleId = extractArticleId(wrappedLink);
    if (articleId === null) {
      throw new DecodeError(
        { kind: 'malformed-payload', reason: 'Missing article ID' },
        wrappedLink
      );
    }
    return decodeLegacyLink(articleId, wrappedLink);
  }

  private async followRedirects(wrappedLink: string): Promise<string> {
    await this.spacer.acquire();

    const policy = new RetryPolicy(
      {
        maxAttempts: this.options.maxRetries,
        baseDelayMs: this.options.retryBaseDelayMs,
        ...(this.sleep ? { sleep: this.sleep } : {}),
      },
      wrappedLink
    );
    const result = await policy.execute(() =>
      this.follower.follow(wrappedLink)
    );
    logDebug('Redirect chain followed', {
      wrappedLink,
      url: result.url,
      redirects: result.redirects,
    });
    return result.url;
  }
}

let defaultDecoder: WrapperDecoder | undefined;

function getDefaultDecoder(): WrapperDecoder {
  defaultDecoder ??= new WrapperDecoder();
  return defaultDecoder;
}

export async function decode(wrappedLink: string): Promise<ResolutionOutcome> {
  return getDefaultDecoder().decode(wrappedLink);
}

export function isLegacyEncoding(wrappedLink: string): boolean {
  return getDefaultDecoder().isLegacyEncoding(wrappedLink);
}
