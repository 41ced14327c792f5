import { normalizeEndpoint } from './normalize';
import type { ProbeAttempt, ProbeResult } from './types';

export const USER_AGENT = 'peerprobe/0.1';

const SUCCESS_STATUS = 200;

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isAbortError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'name' in err) {
    return err.name === 'AbortError';
  }
  return false;
}

/**
 * Runs `run` under a deadline. The signal handed to `run` aborts after `timeoutMs`, and the
 * returned promise rejects with the abort reason at that point even if `run` ignores it.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const expired = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true,
    });
  });

  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await Promise.race([run(controller.signal), expired]);
  } finally {
    clearTimeout(t);
  }
}

export function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  init: RequestInit,
): Promise<Response> {
  return withDeadline(timeoutMs, (signal) => fetch(url, { ...init, signal }));
}

export async function attemptProbe(url: string, timeoutMs: number): Promise<ProbeAttempt> {
  const started = performance.now();

  try {
    const res = await fetchWithTimeout(url, timeoutMs, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
    });

    const latencyMs = Math.round(performance.now() - started);
    const httpStatus = res.status;

    // Only the status line matters; drop the body so the connection is released.
    await res.body?.cancel().catch(() => undefined);

    if (httpStatus !== SUCCESS_STATUS) {
      return { ok: false, httpStatus, latencyMs, error: `Unexpected HTTP status: ${httpStatus}` };
    }
    return { ok: true, httpStatus, latencyMs };
  } catch (err) {
    const latencyMs = Math.round(performance.now() - started);
    if (isAbortError(err)) {
      return { ok: false, httpStatus: null, latencyMs, error: `Timeout after ${timeoutMs}ms` };
    }
    return { ok: false, httpStatus: null, latencyMs, error: toErrorMessage(err) };
  }
}

/**
 * Probes one endpoint with a single GET.
 *
 * Reachable means the final response arrived within `timeoutMs` with status exactly 200.
 * Non-200 statuses, timeouts and transport errors all report `reachable: false`.
 */
export async function probeEndpoint(endpoint: string, timeoutMs: number): Promise<ProbeResult> {
  const url = normalizeEndpoint(endpoint);
  const attempt = await attemptProbe(url, timeoutMs);
  return { endpoint: url, reachable: attempt.ok };
}
