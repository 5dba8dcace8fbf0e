/**
 * Provider transport: fetch with a deadline, and a deadline for SDK promises.
 * Transport failures become TransientError; callers interpret the responses.
 */

import type { ProviderKind } from '../types/transaction';
import { TransientError } from '../domain/errors';
import { logger } from './logger';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;

export interface ProviderRequest {
  provider: ProviderKind;
  operation: string;
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

/** Status, headers and the fully read body; the deadline covers both. */
export interface ProviderResponse {
  status: number;
  ok: boolean;
  headers: Headers;
  body: string;
}

function isTimeout(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false;
  return err.name === 'TimeoutError' || err.name === 'AbortError';
}

export async function providerFetch(request: ProviderRequest): Promise<ProviderResponse> {
  const timeoutMs = request.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  logger.trace('Provider request', { provider: request.provider, operation: request.operation, url: request.url });
  try {
    const response = await fetch(request.url, {
      method: request.method ?? 'POST',
      headers: request.headers,
      body: request.body,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, headers: response.headers, body };
  } catch (err) {
    if (isTimeout(err)) {
      throw new TransientError(
        'timeout',
        `${request.provider} ${request.operation} timed out after ${timeoutMs}ms`,
        request.provider
      );
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransientError('network', `${request.provider} ${request.operation} failed: ${reason}`, request.provider);
  }
}

/** Deadline for SDK calls that do not take an abort signal. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  provider: ProviderKind,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransientError('timeout', `${provider} ${operation} timed out after ${timeoutMs}ms`, provider)),
      timeoutMs
    );
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
