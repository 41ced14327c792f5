import { BatchAbortedError } from './errors';

export type PoolOptions = {
  signal?: AbortSignal;
};

type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Maps `task` over `items` with at most `limit` tasks in flight and yields each
 * value as soon as its task settles, so iteration follows completion order.
 *
 * A rejected task rejects the iteration. Once `signal` aborts no further task is
 * started and iteration rejects with `BatchAbortedError`; tasks already running are
 * left to settle on their own and their values are dropped.
 */
export async function* runPool<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<R>,
  opts: PoolOptions = {},
): AsyncGenerator<R, void, undefined> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }

  const { signal } = opts;
  const pending = items[Symbol.iterator]();
  const settled: Settled<R>[] = [];
  let active = 0;
  let closed = false;
  let wake: (() => void) | null = null;

  const notify = () => {
    const w = wake;
    wake = null;
    w?.();
  };

  const settle = (entry: Settled<R>) => {
    active--;
    settled.push(entry);
    pump();
    notify();
  };

  function pump(): void {
    while (!closed && !signal?.aborted && active < limit) {
      const next = pending.next();
      if (next.done) return;

      const item = next.value;
      active++;
      void Promise.resolve()
        .then(() => task(item))
        .then(
          (value) => settle({ ok: true, value }),
          (error: unknown) => settle({ ok: false, error }),
        );
    }
  }

  signal?.addEventListener('abort', notify);
  try {
    let delivered = 0;
    pump();

    while (true) {
      if (signal?.aborted) throw new BatchAbortedError(delivered, items.length);
      if (delivered === items.length) return;

      const entry = settled.shift();
      if (!entry) {
        await new Promise<void>((resolve) => {
          wake = () => resolve();
        });
        continue;
      }

      delivered++;
      if (!entry.ok) throw entry.error;
      yield entry.value;
    }
  } finally {
    closed = true;
    signal?.removeEventListener('abort', notify);
  }
}
