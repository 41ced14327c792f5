export type Reporter = {
  // False when output is not a terminal; transient status lines are skipped then.
  interactive: boolean;
  line(text: string): void;
  // Replaces the transient status line; null clears it.
  status(text: string | null): void;
};

export type TerminalStream = {
  isTTY?: boolean;
  write(chunk: string): boolean;
};

const CLEAR_LINE = '\r\x1b[K';

export function createTerminalReporter(stream: TerminalStream): Reporter {
  const interactive = stream.isTTY === true;
  let current: string | null = null;

  const clear = () => {
    if (current !== null) stream.write(CLEAR_LINE);
  };

  return {
    interactive,
    line(text) {
      clear();
      stream.write(`${text}\n`);
      if (current !== null) stream.write(current);
    },
    status(text) {
      if (!interactive) return;
      clear();
      current = text;
      if (text !== null) stream.write(text);
    },
  };
}
