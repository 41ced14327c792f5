export type ProbeResult = {
  // Normalized URL that was requested.
  endpoint: string;
  reachable: boolean;
};

// Detailed outcome of a single request. Collapsed to `ProbeResult.reachable` by the prober.
export type ProbeAttempt =
  | { ok: true; httpStatus: number; latencyMs: number }
  | { ok: false; httpStatus: number | null; latencyMs: number; error: string };

export type BatchSummary = {
  total: number;
  working: number;
  failed: number;
  workingSet: string[];
};
