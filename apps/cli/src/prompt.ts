import type { Interface } from 'node:readline/promises';

import { isAbortError } from '@peerprobe/prober';

import type { Prompt } from './menu';

export function createPrompt(rl: Interface): Prompt {
  let closed = false;
  const whenClosed = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  return async (question) => {
    if (closed) return null;

    const answer = rl.question(question).catch((err: unknown) => {
      // A pending question is cancelled when the interface closes (EOF, Ctrl-C).
      if (closed || isAbortError(err)) return null;
      throw err;
    });
    return Promise.race([answer, whenClosed]);
  };
}
