import type { Palette } from './colors';
import type { Reporter } from './reporter';

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;
const SPINNER_INTERVAL_MS = 80;

export type Progress = {
  tick(): void;
  stop(): void;
};

export function formatProgress(label: string, done: number, total: number, frame: number): string {
  const spinner = SPINNER_FRAMES[frame % SPINNER_FRAMES.length] ?? '';
  return `${spinner} ${label} ${done}/${total}`;
}

export function startProgress(
  reporter: Reporter,
  total: number,
  label: string,
  palette: Palette,
): Progress {
  if (!reporter.interactive) {
    return { tick: () => undefined, stop: () => undefined };
  }

  let done = 0;
  let frame = 0;
  let timer: ReturnType<typeof setInterval> | null = null;
  const render = () => reporter.status(palette.cyan(formatProgress(label, done, total, frame)));

  render();
  timer = setInterval(() => {
    frame++;
    render();
  }, SPINNER_INTERVAL_MS);
  timer.unref();

  return {
    tick() {
      done++;
      render();
    },
    stop() {
      if (timer === null) return;
      clearInterval(timer);
      timer = null;
      reporter.status(null);
    },
  };
}
