import { setTimeout as setTimeoutPromise } from 'node:timers/promises';

import { isAbortError } from './error-utils.js';

export type Sleep = (delayMs: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = async (delayMs) => {
  if (delayMs <= 0) return;
  await setTimeoutPromise(delayMs);
};

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  if (timeoutMs <= 0) return promise;

  const controller = new AbortController();
  const timeout = setTimeoutPromise(timeoutMs, undefined, {
    ref: false,
    signal: controller.signal,
  }).then(
    () => Promise.reject(onTimeout()),
    (error: unknown) =>
      isAbortError(error)
        ? new Promise<never>(() => {})
        : Promise.reject(error)
  );

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    controller.abort();
  }
}
