import dns from 'node:dns';
import { isIP } from 'node:net';

import { config } from '../config/index.js';
import { SecurityRejectionError } from '../errors/app-error.js';
import { logDebug } from '../services/logger.js';
import { isSystemError } from './error-utils.js';
import { IpRangeGuard } from './ip-address.js';
import { withTimeout } from './timer-utils.js';

export type HostResolver = (hostname: string) => Promise<string[]>;

export interface UrlSafetyValidatorOptions {
  resolveHost?: HostResolver;
  guard?: IpRangeGuard;
  maxUrlLength?: number;
}

const ALLOWED_SCHEMES: ReadonlySet<string> = new Set(['http', 'https']);
const SCHEME_PREFIX = /^([a-z][a-z0-9+.-]*):/i;
const HTTP_PREFIX = /^https?:\/\//i;

/**
 * Resolves every address of `hostname`. No caching: each validation looks
 * the name up again so a later rebinding to a private address is caught.
 */
export const lookupHost: HostResolver = async (hostname) => {
  const addresses = await withTimeout(
    dns.promises.lookup(hostname, { all: true }),
    config.constants.dnsLookupTimeoutMs,
    () => new Error(`DNS lookup timed out for ${hostname}`)
  );
  return addresses.map((entry) => entry.address);
};

function assertUrlPresent(url: string): void {
  if (!url) {
    throw new SecurityRejectionError(
      'Invalid URL format: URL is empty',
      url
    );
  }
}

function assertUrlLength(url: string, maxLength: number): void {
  if (url.length > maxLength) {
    throw new SecurityRejectionError(
      `URL too long (max ${maxLength} characters)`,
      url
    );
  }
}

// Checked on the raw string: some malformed inputs parse into a URL whose
// protocol no longer reflects what the caller passed in.
function assertSchemeAllowed(url: string): void {
  const scheme = SCHEME_PREFIX.exec(url)?.[1]?.toLowerCase();
  if (scheme !== undefined && !ALLOWED_SCHEMES.has(scheme)) {
    throw new SecurityRejectionError(
      `Invalid URL scheme (must be HTTP/HTTPS): ${scheme}`,
      url
    );
  }
  if (!HTTP_PREFIX.test(url)) {
    throw new SecurityRejectionError(
      'Invalid URL format: Could not parse URL',
      url
    );
  }
}

function parseHost(url: string): string {
  if (!URL.canParse(url)) {
    throw new SecurityRejectionError(
      'Invalid URL format: Could not parse URL',
      url
    );
  }

  const { hostname } = new URL(url);
  if (!hostname) {
    throw new SecurityRejectionError(
      'Invalid URL format: Could not parse URL',
      url
    );
  }
  return hostname;
}

export class UrlSafetyValidator {
  private readonly resolveHost: HostResolver;
  private readonly guard: IpRangeGuard;
  private readonly maxUrlLength: number;

  constructor(options: UrlSafetyValidatorOptions = {}) {
    this.resolveHost = options.resolveHost ?? lookupHost;
    this.guard = options.guard ?? new IpRangeGuard();
    this.maxUrlLength = options.maxUrlLength ?? config.constants.maxUrlLength;
  }

  /**
   * Rejects with SecurityRejectionError unless `url` is an http(s) URL whose
   * host resolves only to allowed addresses. Resolves with the first address.
   */
  async validate(url: string): Promise<string> {
    assertUrlPresent(url);
    assertUrlLength(url, this.maxUrlLength);
    assertSchemeAllowed(url);

    const hostname = parseHost(url);
    const addresses = await this.resolveAddresses(hostname, url);

    for (const address of addresses) {
      if (this.guard.isBlocked(address)) {
        throw new SecurityRejectionError(
          `Private IP address blocked: ${address}`,
          url
        );
      }
    }

    const [first] = addresses;
    if (first === undefined) {
      throw new SecurityRejectionError(
        `Could not resolve hostname: ${hostname}`,
        url
      );
    }
    return first;
  }

  private async resolveAddresses(
    hostname: string,
    url: string
  ): Promise<string[]> {
    if (hostname.startsWith('[') && hostname.endsWith(']')) {
      const ip = hostname.slice(1, -1);
      if (isIP(ip) !== 6) {
        throw new SecurityRejectionError(`Invalid IPv6 address: ${ip}`, url);
      }
      return [ip];
    }

    if (isIP(hostname) === 4) return [hostname];

    let addresses: string[];
    try {
      addresses = await this.resolveHost(hostname);
    } catch (error) {
      logDebug('Host resolution failed', {
        hostname,
        ...(isSystemError(error) ? { code: error.code } : {}),
      });
      throw new SecurityRejectionError(
        `Could not resolve hostname: ${hostname}`,
        url
      );
    }

    const valid = addresses.filter((address) => isIP(address) !== 0);
    if (valid.length === 0 || valid.length !== addresses.length) {
      throw new SecurityRejectionError(
        `Could not resolve hostname: ${hostname}`,
        url
      );
    }
    return valid;
  }
}

const defaultValidator = new UrlSafetyValidator();

export async function validateOutboundUrl(url: string): Promise<string> {
  return defaultValidator.validate(url);
}
