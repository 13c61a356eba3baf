import { performance } from 'perf_hooks';
import type { FetchLike } from '@strike-quoter/polymarket';
import { toError } from '@strike-quoter/core';

export interface ProbeResult {
  name: string;
  url: string;
  ok: boolean;
  latencyMs: number;
  status?: number;
  error?: string;
}

export interface ProbeOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
  clock?: () => number;
}

export type LatencyRating = 'excellent' | 'good' | 'ok';

export interface CancelReplaceEstimate {
  estimatedMs: number;
  rating: LatencyRating;
}

/** Time one GET round trip. Never throws; failures come back with ok=false. */
export async function probeEndpoint(name: string, url: string, options: ProbeOptions): Promise<ProbeResult> {
  const fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const clock = options.clock ?? (() => performance.now());

  const started = clock();
  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) });
    const latencyMs = clock() - started;
    await response.body?.cancel();
    return {
      name,
      url,
      ok: response.ok,
      latencyMs,
      status: response.status,
      error: response.ok ? undefined : `HTTP ${response.status}`,
    };
  } catch (err) {
    return { name, url, ok: false, latencyMs: clock() - started, error: toError(err).message };
  }
}

/** A cancel/replace costs two CLOB round trips. */
export function estimateCancelReplace(clobLatencyMs: number): CancelReplaceEstimate {
  const estimatedMs = clobLatencyMs * 2;
  let rating: LatencyRating = 'ok';
  if (estimatedMs < 200) {
    rating = 'excellent';
  } else if (estimatedMs < 300) {
    rating = 'good';
  }
  return { estimatedMs, rating };
}

export function checkTargets(clobUrl: string, binanceApiUrl: string, symbol: string): Array<[string, string]> {
  const trim = (url: string) => url.replace(/\/+$/, '');
  return [
    ['Polymarket CLOB', `${trim(clobUrl)}/markets`],
    ['Binance', `${trim(binanceApiUrl)}/api/v3/ticker/price?symbol=${encodeURIComponent(symbol)}`],
  ];
}
