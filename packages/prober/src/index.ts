export { BatchAbortedError } from './errors';
export {
  USER_AGENT,
  attemptProbe,
  fetchWithTimeout,
  isAbortError,
  probeEndpoint,
  toErrorMessage,
  withDeadline,
} from './http';
export { hasHttpScheme, normalizeEndpoint } from './normalize';
export { runPool, type PoolOptions } from './pool';
export {
  DEFAULT_CONCURRENCY,
  collectBatch,
  probeAll,
  summarizeBatch,
  type ProbeAllOptions,
} from './prober';
export type { BatchSummary, ProbeAttempt, ProbeResult } from './types';
