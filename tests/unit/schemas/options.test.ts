import { describe, expect, test } from 'vitest';

import { config } from '../../../src/config/index.js';
import { ValidationError } from '../../../src/errors/app-error.js';
import {
  resolveDecoderOptions,
  resolveRetryPolicy,
} from '../../../src/schemas/options.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('resolveDecoderOptions', () => {
  test('falls back to configured defaults', () => {
    expect(resolveDecoderOptions()).toEqual(config.decoder);
  });

  test('applies overrides on top of defaults', () => {
    const options = resolveDecoderOptions({
      timeoutMs: 2500,
      wrapperHosts: ['wrap.test'],
    });

    expect(options.timeoutMs).toBe(2500);
    expect(options.wrapperHosts).toEqual(['wrap.test']);
    expect(options.maxRedirects).toBe(config.decoder.maxRedirects);
  });

  test('ignores overrides left undefined', () => {
    const options = resolveDecoderOptions({ maxRetries: undefined });

    expect(options.maxRetries).toBe(config.decoder.maxRetries);
  });

  test('reports the offending field', () => {
    const error = captureError(() =>
      resolveDecoderOptions({ maxRedirects: -1 })
    );

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.message).toBe('Invalid decoder options');
    expect(error.details).toEqual({
      issues: [{ path: 'maxRedirects', message: expect.any(String) }],
    });
  });

  test('rejects an empty host list', () => {
    expect(() => resolveDecoderOptions({ wrapperHosts: [] })).toThrow(
      'Invalid decoder options'
    );
  });
});

describe('resolveRetryPolicy', () => {
  test('falls back to configured defaults', () => {
    expect(resolveRetryPolicy()).toEqual(config.retry);
  });

  test('accepts a zero retry budget', () => {
    expect(resolveRetryPolicy({ maxRetries: 0 }).maxRetries).toBe(0);
  });

  test('rejects a non-positive base delay', () => {
    const error = captureError(() =>
      resolveRetryPolicy({ baseBackoffSeconds: 0 })
    );

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.message).toBe('Invalid retry policy');
    expect(error.details).toEqual({
      issues: [{ path: 'baseBackoffSeconds', message: expect.any(String) }],
    });
  });
});
