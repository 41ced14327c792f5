export class BatchAbortedError extends Error {
  readonly code = 'BATCH_ABORTED';

  constructor(
    readonly completed: number,
    readonly total: number,
  ) {
    super(`Batch aborted after ${completed} of ${total} probes`);
    this.name = 'BatchAbortedError';
  }
}
