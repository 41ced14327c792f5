import { timeoutInputSchema } from './schemas/env';

export { DEFAULT_TIMEOUT_SEC, MAX_TIMEOUT_SEC } from './schemas/env';

// Returns the timeout in seconds, or null unless the input is a number in (0, MAX_TIMEOUT_SEC].
export function parseTimeoutInput(raw: string): number | null {
  const r = timeoutInputSchema.safeParse(raw);
  return r.success ? r.data : null;
}

export function timeoutToMs(timeoutSec: number): number {
  return Math.max(1, Math.round(timeoutSec * 1000));
}
