import { describe, expect, test, vi } from 'vitest';

import { SecurityRejectionError } from '../../../src/errors/app-error.js';
import { IpRangeGuard } from '../../../src/utils/ip-address.js';
import {
  type HostResolver,
  UrlSafetyValidator,
} from '../../../src/utils/url-validator.js';

function resolverFor(records: Record<string, string[]>): HostResolver {
  return vi.fn(async (hostname: string) => {
    const addresses = records[hostname];
    if (!addresses) throw new Error(`getaddrinfo ENOTFOUND ${hostname}`);
    return addresses;
  });
}

function validatorFor(records: Record<string, string[]> = {}) {
  const resolveHost = resolverFor(records);
  return {
    resolveHost,
    validator: new UrlSafetyValidator({ resolveHost }),
  };
}

async function rejectionOf(
  validator: UrlSafetyValidator,
  url: string
): Promise<SecurityRejectionError> {
  const error: unknown = await validator.validate(url).then(
    () => undefined,
    (reason: unknown) => reason
  );
  if (!(error instanceof SecurityRejectionError)) {
    throw new Error(`Expected ${url} to be rejected`);
  }
  return error;
}

describe('UrlSafetyValidator', () => {
  describe('accepted URLs', () => {
    test('accepts a hostname resolving to a public address', async () => {
      const { validator, resolveHost } = validatorFor({
        'example.com': ['93.184.216.34'],
      });

      await expect(validator.validate('https://example.com/a')).resolves.toBe(
        '93.184.216.34'
      );
      expect(resolveHost).toHaveBeenCalledWith('example.com');
    });

    test('accepts a public IPv4 literal without a lookup', async () => {
      const { validator, resolveHost } = validatorFor();

      await expect(
        validator.validate('http://93.184.216.34/path')
      ).resolves.toBe('93.184.216.34');
      expect(resolveHost).not.toHaveBeenCalled();
    });

    test('accepts an upper-case scheme', async () => {
      const { validator } = validatorFor({ 'example.com': ['93.184.216.34'] });

      await expect(validator.validate('HTTPS://example.com/')).resolves.toBe(
        '93.184.216.34'
      );
    });

    test('looks the host up again on every call', async () => {
      const { validator, resolveHost } = validatorFor({
        'example.com': ['93.184.216.34'],
      });

      await validator.validate('https://example.com/one');
      await validator.validate('https://example.com/two');
      expect(resolveHost).toHaveBeenCalledTimes(2);
    });
  });

  describe('blocked addresses', () => {
    test.each([
      ['10.0.0.0/8', '10.20.30.40'],
      ['127.0.0.0/8', '127.0.0.1'],
      ['169.254.0.0/16', '169.254.169.254'],
      ['fc00::/7', 'fd00::1234'],
    ])('rejects a host resolving into %s', async (_range, address) => {
      const { validator } = validatorFor({ 'internal.test': [address] });

      const error = await rejectionOf(validator, 'https://internal.test/');
      expect(error.reason).toBe(`Private IP address blocked: ${address}`);
      expect(error.statusCode).toBe(403);
      expect(error.code).toBe('BLOCKED_URL');
      expect(error.url).toBe('https://internal.test/');
    });

    test('rejects a private IPv4 literal', async () => {
      const { validator } = validatorFor();

      const error = await rejectionOf(
        validator,
        'http://169.254.169.254/latest/meta-data/'
      );
      expect(error.message).toBe(
        'Private IP address blocked: 169.254.169.254'
      );
    });

    test('rejects a private bracketed IPv6 literal', async () => {
      const { validator } = validatorFor();

      const error = await rejectionOf(validator, 'http://[fc00::1]/');
      expect(error.message).toBe('Private IP address blocked: fc00::1');
    });

    test('rejects an IPv4-mapped loopback literal', async () => {
      const { validator } = validatorFor();

      const error = await rejectionOf(validator, 'http://[::ffff:127.0.0.1]/');
      expect(error.message).toBe('Private IP address blocked: ::ffff:7f00:1');
    });

    test('rejects when any resolved address is private', async () => {
      const { validator } = validatorFor({
        'mixed.test': ['93.184.216.34', '10.1.2.3'],
      });

      const error = await rejectionOf(validator, 'https://mixed.test/');
      expect(error.message).toBe('Private IP address blocked: 10.1.2.3');
    });

    test('uses the injected guard', async () => {
      const validator = new UrlSafetyValidator({
        resolveHost: resolverFor({}),
        guard: new IpRangeGuard(['93.184.216.0/24']),
      });

      const error = await rejectionOf(validator, 'http://93.184.216.34/');
      expect(error.message).toBe('Private IP address blocked: 93.184.216.34');
    });
  });

  describe('malformed input', () => {
    test('rejects an empty URL', async () => {
      const { validator } = validatorFor();

      const error = await rejectionOf(validator, '');
      expect(error.message).toBe('Invalid URL format: URL is empty');
    });

    test('rejects URLs over the length limit', async () => {
      const { validator, resolveHost } = validatorFor();

      const error = await rejectionOf(
        validator,
        `https://example.com/${'a'.repeat(2000)}`
      );
      expect(error.message).toBe('URL too long (max 2000 characters)');
      expect(resolveHost).not.toHaveBeenCalled();
    });

    test('honours a custom length limit', async () => {
      const validator = new UrlSafetyValidator({
        resolveHost: resolverFor({}),
        maxUrlLength: 20,
      });

      const error = await rejectionOf(validator, 'https://example.com/abc');
      expect(error.message).toBe('URL too long (max 20 characters)');
    });

    test.each([
      ['ftp://example.com/file', 'ftp'],
      ['javascript:alert(1)', 'javascript'],
      ['FILE:///etc/passwd', 'file'],
    ])('rejects %s by scheme', async (url, scheme) => {
      const { validator } = validatorFor();

      const error = await rejectionOf(validator, url);
      expect(error.message).toBe(
        `Invalid URL scheme (must be HTTP/HTTPS): ${scheme}`
      );
    });

    test('rejects an http scheme without an authority', async () => {
      const { validator } = validatorFor();

      const error = await rejectionOf(validator, 'http:/example.com');
      expect(error.message).toBe('Invalid URL format: Could not parse URL');
    });

    test('rejects a string without a scheme', async () => {
      const { validator } = validatorFor();

      const error = await rejectionOf(validator, 'example.com/path');
      expect(error.message).toBe('Invalid URL format: Could not parse URL');
    });
  });

  describe('host resolution', () => {
    test('rejects a host that does not resolve', async () => {
      const { validator } = validatorFor();

      const error = await rejectionOf(validator, 'https://missing.test/');
      expect(error.message).toBe('Could not resolve hostname: missing.test');
    });

    test('rejects a host with no addresses', async () => {
      const { validator } = validatorFor({ 'empty.test': [] });

      const error = await rejectionOf(validator, 'https://empty.test/');
      expect(error.message).toBe('Could not resolve hostname: empty.test');
    });

    test('rejects a resolver answer that is not an IP', async () => {
      const { validator } = validatorFor({ 'odd.test': ['not-an-ip'] });

      const error = await rejectionOf(validator, 'https://odd.test/');
      expect(error.message).toBe('Could not resolve hostname: odd.test');
    });
  });
});
