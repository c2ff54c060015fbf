import { z } from 'zod';

import { config } from '../config/index.js';
import { ValidationError } from '../errors/app-error.js';

export const decoderOptionsSchema = z.strictObject({
  timeoutMs: z
    .number()
    .int()
    .min(1)
    .max(120000)
    .describe('Per-request timeout for redirect-follow requests.'),
  maxRedirects: z.number().int().min(0).max(50),
  rateLimitDelayMs: z
    .number()
    .int()
    .min(0)
    .max(60000)
    .describe('Minimum spacing between redirect-follow decodes.'),
  maxRetries: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Total attempts per redirect-follow decode.'),
  retryBaseDelayMs: z.number().int().min(0).max(10000),
  userAgent: z.string().min(1),
  wrapperHosts: z.array(z.string().min(1)).min(1),
  legacyIdMaxLength: z
    .number()
    .int()
    .min(4)
    .max(10000)
    .describe('Identifiers of this length or longer are redirect-based.'),
});

export type DecoderOptions = z.infer<typeof decoderOptionsSchema>;

export const retryPolicySchema = z.strictObject({
  maxRetries: z.number().int().min(0).max(20),
  baseBackoffSeconds: z.number().positive(),
  maxJitterSeconds: z.number().min(0),
});

export type RetryPolicyConfig = z.infer<typeof retryPolicySchema>;

function parseWith<T>(
  schema: z.ZodType<T>,
  input: unknown,
  message: string
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

function definedOnly(overrides: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
}

export function resolveDecoderOptions(
  overrides: Partial<DecoderOptions> = {}
): DecoderOptions {
  return parseWith(
    decoderOptionsSchema,
    { ...config.decoder, ...definedOnly(overrides) },
    'Invalid decoder options'
  );
}

export function resolveRetryPolicy(
  overrides: Partial<RetryPolicyConfig> = {}
): RetryPolicyConfig {
  return parseWith(
    retryPolicySchema,
    { ...config.retry, ...definedOnly(overrides) },
    'Invalid retry policy'
  );
}
