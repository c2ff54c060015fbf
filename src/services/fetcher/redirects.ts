import type { LookupFunction } from 'node:net';
import { Readable } from 'node:stream';

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import {
  DecodeError,
  SecurityRejectionError,
} from '../../errors/app-error.js';
import { createGuardedAgents, createGuardedLookup } from './agents.js';
import { failureForStatus, mapRequestError } from './errors.js';
import { attachInterceptors } from './interceptors.js';

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

export type RedirectPreflight = (url: string) => Promise<unknown>;

export interface RedirectFollowerOptions {
  timeoutMs: number;
  maxRedirects: number;
  userAgent: string;
  /** Checked against every redirect target before it is requested. */
  preflight?: RedirectPreflight;
  client?: AxiosInstance;
}

export interface RedirectResult {
  readonly url: string;
  readonly status: number;
  readonly redirects: number;
}

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

function discardBody(response: AxiosResponse<unknown>): void {
  if (response.data instanceof Readable) response.data.destroy();
}

function sameUrl(a: string, b: string): boolean {
  if (a === b) return true;
  return (
    URL.canParse(a) && URL.canParse(b) && new URL(a).href === new URL(b).href
  );
}

export function createRedirectClient(
  lookup: LookupFunction = createGuardedLookup()
): AxiosInstance {
  return axios.create({
    ...createGuardedAgents(lookup),
    // A proxy would resolve hosts itself, out of reach of the guarded lookup.
    proxy: false,
    maxRedirects: 0,
    responseType: 'stream',
    decompress: true,
    validateStatus: () => true,
    headers: {
      Accept:
        'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
    },
  });
}

/**
 * Follows HTTP redirects one hop at a time and reports where the chain
 * ends. Response bodies are never read.
 */
export class RedirectFollower {
  private readonly client: AxiosInstance;

  constructor(private readonly options: RedirectFollowerOptions) {
    this.client = options.client ?? createRedirectClient();
    attachInterceptors(this.client);
  }

  async follow(url: string): Promise<RedirectResult> {
    const limit = Math.max(0, this.options.maxRedirects);
    let currentUrl = url;

    for (let redirects = 0; ; redirects++) {
      if (redirects > 0 && this.options.preflight) {
        await this.options.preflight(currentUrl);
      }

      const response = await this.request(currentUrl);
      if (!isRedirectStatus(response.status)) {
        return this.finish(url, currentUrl, response, redirects);
      }

      if (redirects >= limit) {
        throw new DecodeError({ kind: 'too-many-redirects', limit }, url);
      }
      currentUrl = this.nextLocation(currentUrl, response);
    }
  }

  private async request(url: string): Promise<AxiosResponse<unknown>> {
    try {
      const response = await this.client.request<unknown>({
        method: 'GET',
        url,
        maxRedirects: 0,
        timeout: this.options.timeoutMs,
        responseType: 'stream',
        validateStatus: () => true,
        headers: { 'User-Agent': this.options.userAgent },
      });
      discardBody(response);
      return response;
    } catch (error) {
      throw mapRequestError(error, url, this.options.timeoutMs);
    }
  }

  private finish(
    originalUrl: string,
    finalUrl: string,
    response: AxiosResponse<unknown>,
    redirects: number
  ): RedirectResult {
    if (response.status >= 400) {
      throw new DecodeError(
        failureForStatus(response.status, response.headers['retry-after']),
        originalUrl
      );
    }
    if (sameUrl(finalUrl, originalUrl)) {
      throw new DecodeError({ kind: 'no-redirect' }, originalUrl);
    }
    return { url: finalUrl, status: response.status, redirects };
  }

  private nextLocation(
    currentUrl: string,
    response: AxiosResponse<unknown>
  ): string {
    const location: unknown = response.headers['location'];
    if (typeof location !== 'string' || !location) {
      throw new DecodeError(
        {
          kind: 'unclassified',
          message: 'Redirect response missing Location header',
        },
        currentUrl
      );
    }
    if (!URL.canParse(location, currentUrl)) {
      throw new DecodeError(
        { kind: 'invalid-input', reason: 'Invalid redirect target' },
        currentUrl
      );
    }
    const target = new URL(location, currentUrl);
    if (target.username || target.password) {
      throw new SecurityRejectionError(
        'Redirect target includes credentials',
        target.href
      );
    }
    return target.href;
  }
}
