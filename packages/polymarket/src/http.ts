import type { z } from 'zod';
import { ExchangeRequestError, toError } from '@strike-quoter/core';
import type { RateLimiter } from './rate-limiter.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonRequest<T> {
  baseUrl: string;
  endpoint: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  limiter: RateLimiter;
  timeoutMs: number;
  fetchImpl: FetchLike;
  init?: RequestInit;
  headers?: Record<string, string>;
}

/**
 * Rate-limited JSON request with a per-call timeout. Transport failures,
 * non-2xx statuses and responses that do not match `schema` all surface as
 * ExchangeRequestError.
 */
export async function requestJson<T>(request: JsonRequest<T>): Promise<T> {
  const { baseUrl, endpoint, schema, limiter, timeoutMs, fetchImpl, init = {} } = request;
  await limiter.acquire();

  const url = `${baseUrl.replace(/\/+$/, '')}${endpoint}`;
  let response: Response;
  try {
    response = await fetchImpl(url, {
      ...init,
      headers: {
        'Content-Type': 'application/json',
        ...request.headers,
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const cause = toError(error);
    const reason = cause.name === 'TimeoutError' ? `timed out after ${timeoutMs}ms` : cause.message;
    throw new ExchangeRequestError(endpoint, `Request to ${endpoint} failed: ${reason}`);
  }

  if (!response.ok) {
    const errorText = await response.text();
    throw new ExchangeRequestError(
      endpoint,
      `API error ${response.status}: ${errorText}`,
      response.status
    );
  }

  const body: unknown = await response.json();
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ExchangeRequestError(
      endpoint,
      `Unexpected response from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
      response.status
    );
  }
  return parsed.data;
}
