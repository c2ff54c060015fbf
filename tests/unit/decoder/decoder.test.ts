import { describe, expect, test, vi } from 'vitest';

import {
  SecurityRejectionError,
  ValidationError,
} from '../../../src/errors/app-error.js';
import type { DecoderOptions } from '../../../src/schemas/options.js';
import {
  isLegacyEncoding,
  WrapperDecoder,
} from '../../../src/services/decoder.js';
import { ResolutionRetryScheduler } from '../../../src/services/scheduler/scheduler.js';
import { InMemoryArticleStore } from '../../../src/services/store/in-memory-store.js';
import { UrlSafetyValidator } from '../../../src/utils/url-validator.js';
import {
  createFakeHttp,
  type FakeRoute,
  routeTable,
} from '../../helpers/fake-http.js';
import { legacyLink, redirectLink } from '../../helpers/legacy-links.js';

const WRAPPED = redirectLink();
const PUBLIC_HOSTS: Record<string, string[]> = {
  'example.com': ['93.184.216.34'],
};

function setup(
  route: FakeRoute = () => ({ status: 500 }),
  options: Partial<DecoderOptions> = {}
) {
  const http = createFakeHttp(route);
  const resolveHost = vi.fn(async (hostname: string) => {
    const addresses = PUBLIC_HOSTS[hostname];
    if (!addresses) throw new Error(`getaddrinfo ENOTFOUND ${hostname}`);
    return addresses;
  });
  const acquire = vi.fn(async () => {});
  const sleep = vi.fn(async (_delayMs: number) => {});
  const decoder = new WrapperDecoder(
    { userAgent: 'test-agent', ...options },
    {
      validator: new UrlSafetyValidator({ resolveHost }),
      spacer: { acquire },
      client: http.client,
      sleep,
    }
  );
  return { decoder, http, resolveHost, acquire, sleep };
}

describe('WrapperDecoder', () => {
  describe('legacy links', () => {
    test('decodes the embedded URL without touching the network', async () => {
      const { decoder, http, acquire, resolveHost } = setup();

      const outcome = await decoder.decode(legacyLink('https://example.com/a'));

      expect(outcome).toEqual({
        status: 'resolved',
        url: 'https://example.com/a',
        variant: 'legacy-embedded',
      });
      expect(Object.isFrozen(outcome)).toBe(true);
      expect(http.requests).toEqual([]);
      expect(acquire).not.toHaveBeenCalled();
      expect(resolveHost).toHaveBeenCalledWith('example.com');
    });

    test('decodes non-ASCII characters at the end of the URL', async () => {
      const { decoder } = setup();

      const outcome = await decoder.decode(
        legacyLink('https://example.com/voilà')
      );

      expect(outcome).toEqual({
        status: 'resolved',
        url: 'https://example.com/voilà',
        variant: 'legacy-embedded',
      });
    });

    test('blocks an embedded URL pointing at a private address', async () => {
      const { decoder } = setup();

      await expect(
        decoder.decode(legacyLink('http://10.0.0.5/admin'))
      ).resolves.toEqual({
        status: 'blocked',
        reason: 'Private IP address blocked: 10.0.0.5',
        url: 'http://10.0.0.5/admin',
      });
    });

    test('blocks an embedded URL with a disallowed scheme', async () => {
      const { decoder } = setup();

      await expect(
        decoder.decode(legacyLink('ftp://example.com/file', { trailer: [1] }))
      ).resolves.toEqual({
        status: 'blocked',
        reason: 'Invalid URL scheme (must be HTTP/HTTPS): ftp',
        url: 'ftp://example.com/file',
      });
    });

    test('fails on a malformed identifier', async () => {
      const { decoder } = setup();

      await expect(
        decoder.decode('https://news.google.com/rss/articles/CBM!!!!')
      ).resolves.toEqual({
        status: 'failed',
        failure: {
          kind: 'malformed-payload',
          reason: 'Invalid base64 encoding in article ID',
        },
        message: 'Malformed payload: Invalid base64 encoding in article ID',
      });
    });
  });

  describe('redirect-based links', () => {
    test('follows the redirect chain to the destination', async () => {
      const { decoder, http, acquire, resolveHost } = setup(
        routeTable({
          [WRAPPED]: { status: 302, location: 'https://example.com/story' },
          'https://example.com/story': { status: 200 },
        })
      );

      await expect(decoder.decode(WRAPPED)).resolves.toEqual({
        status: 'resolved',
        url: 'https://example.com/story',
        variant: 'redirect-based',
      });
      expect(http.requests).toEqual([WRAPPED, 'https://example.com/story']);
      expect(http.userAgents).toEqual(['test-agent', 'test-agent']);
      expect(acquire).toHaveBeenCalledTimes(1);
      expect(resolveHost).toHaveBeenCalledTimes(2);
    });

    test('blocks a redirect to the metadata service without requesting it', async () => {
      const { decoder, http, sleep } = setup(
        routeTable({
          [WRAPPED]: {
            status: 302,
            location: 'http://169.254.169.254/latest/meta-data/',
          },
        })
      );

      await expect(decoder.decode(WRAPPED)).resolves.toEqual({
        status: 'blocked',
        reason: 'Private IP address blocked: 169.254.169.254',
        url: 'http://169.254.169.254/latest/meta-data/',
      });
      expect(http.requests).toEqual([WRAPPED]);
      expect(sleep).not.toHaveBeenCalled();
    });

    test('recovers when a later attempt succeeds', async () => {
      const { decoder, http, sleep } = setup((url, call) => {
        if (call === 1) return { error: 'timeout' };
        return url === WRAPPED
          ? { status: 301, location: 'https://example.com/story' }
          : { status: 200 };
      });

      const outcome = await decoder.decode(WRAPPED);

      expect(outcome.status).toBe('resolved');
      expect(http.requests).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[200]]);
    });

    test('fails after every attempt times out', async () => {
      const { decoder, http, sleep, acquire } = setup(() => ({
        error: 'timeout',
      }));

      await expect(decoder.decode(WRAPPED)).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'timeout', timeoutMs: 10000 },
        message:
          'Failed to decode after 3 attempts: Request timeout after 10000ms',
      });
      expect(http.requests).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[200], [400]]);
      expect(acquire).toHaveBeenCalledTimes(1);
    });

    test('respects a custom attempt count', async () => {
      const { decoder, http } = setup(() => ({ status: 404 }), {
        maxRetries: 1,
      });

      await expect(decoder.decode(WRAPPED)).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'http-status', status: 404 },
        message: 'Failed to decode after 1 attempts: HTTP 404',
      });
      expect(http.requests).toHaveLength(1);
    });
  });

  describe('input checks', () => {
    test('rejects an empty link', async () => {
      const { decoder } = setup();

      await expect(decoder.decode('  ')).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'invalid-input', reason: 'Link is empty' },
        message: 'Invalid URL: Link is empty',
      });
    });

    test('rejects links from other hosts', async () => {
      const { decoder, http } = setup();
      const link = 'https://example.com/rss/articles/CBMabc';

      await expect(decoder.decode(link)).resolves.toEqual({
        status: 'failed',
        failure: { kind: 'invalid-input', reason: `Not a wrapped link: ${link}` },
        message: `Invalid URL: Not a wrapped link: ${link}`,
      });
      expect(http.requests).toEqual([]);
    });

    test('accepts configured wrapper hosts', async () => {
      const { decoder } = setup(undefined, { wrapperHosts: ['wrap.test'] });
      const link = legacyLink('https://example.com/a').replace(
        'news.google.com',
        'wrap.test'
      );

      await expect(decoder.resolve(link)).resolves.toBe('https://example.com/a');
    });

    test('rejects invalid options', () => {
      expect(() => new WrapperDecoder({ timeoutMs: 0 })).toThrow(
        ValidationError
      );
    });
  });

  describe('resolve', () => {
    test('throws the safety rejection for blocked URLs', async () => {
      const { decoder } = setup();

      await expect(
        decoder.resolve(legacyLink('http://127.0.0.1/'))
      ).rejects.toBeInstanceOf(SecurityRejectionError);
    });
  });

  describe('variant detection', () => {
    test('uses the configured length threshold', () => {
      const { decoder, http } = setup(undefined, { legacyIdMaxLength: 20 });
      const link = legacyLink('https://example.com/a');

      expect(decoder.detectVariant(link)).toBe('redirect-based');
      expect(decoder.isLegacyEncoding(link)).toBe(false);
      expect(http.requests).toEqual([]);
    });

    test('is exposed with default settings', () => {
      expect(isLegacyEncoding(legacyLink('https://example.com/a'))).toBe(true);
      expect(isLegacyEncoding(WRAPPED)).toBe(false);
    });
  });

  test('feeds a timed-out decode into the retry scheduler', async () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    const { decoder } = setup(() => ({ error: 'timeout' }));
    const store = new InMemoryArticleStore();
    store.add({ id: 'a-1', wrappedLink: WRAPPED });
    const scheduler = new ResolutionRetryScheduler(
      store,
      {},
      { clock: () => now.getTime() }
    );

    await scheduler.report('a-1', await decoder.decode(WRAPPED));

    const state = store.get('a-1');
    const delayMs = (state.nextRetryAt?.getTime() ?? 0) - now.getTime();
    expect(state.retryCount).toBe(1);
    expect(delayMs).toBeGreaterThanOrEqual(60_000);
    expect(delayMs).toBeLessThan(70_000);
  });
});
