import { probeEndpoint } from './http';
import { runPool } from './pool';
import type { BatchSummary, ProbeResult } from './types';

export const DEFAULT_CONCURRENCY = 10;

// Longest delay setTimeout honours; larger values fire immediately.
const MAX_TIMEOUT_MS = 2_147_483_647;

export type ProbeAllOptions = {
  timeoutMs: number;
  concurrency?: number;
  // Called once per probe, the moment it completes.
  onResult?: (result: ProbeResult) => void;
  signal?: AbortSignal;
};

/**
 * Probes every endpoint with at most `concurrency` requests in flight.
 *
 * Yields exactly one result per input endpoint, in completion order. Each call
 * starts a new, independent batch.
 */
export function probeAll(
  endpoints: readonly string[],
  options: ProbeAllOptions,
): AsyncGenerator<ProbeResult, void, undefined> {
  const { timeoutMs, concurrency = DEFAULT_CONCURRENCY, onResult, signal } = options;

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`timeoutMs must be in (0, ${MAX_TIMEOUT_MS}], got ${timeoutMs}`);
  }
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  return runPool(
    endpoints,
    concurrency,
    async (endpoint) => {
      const result = await probeEndpoint(endpoint, timeoutMs);
      onResult?.(result);
      return result;
    },
    { signal },
  );
}

export async function collectBatch(results: AsyncIterable<ProbeResult>): Promise<ProbeResult[]> {
  const batch: ProbeResult[] = [];
  for await (const result of results) {
    batch.push(result);
  }
  return batch;
}

export function summarizeBatch(results: readonly ProbeResult[]): BatchSummary {
  const workingSet = results.filter((r) => r.reachable).map((r) => r.endpoint);
  return {
    total: results.length,
    working: workingSet.length,
    failed: results.length - workingSet.length,
    workingSet,
  };
}
