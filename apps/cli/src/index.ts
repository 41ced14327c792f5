import { createInterface } from 'node:readline/promises';

import { readConfig, type AppConfig } from './env';
import { ConfigError } from './errors';
import { runMenu } from './menu';
import { createPalette } from './output/colors';
import { createTerminalReporter } from './output/reporter';
import { createPrompt } from './prompt';
import { Session } from './session';

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = readConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`config: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const reporter = createTerminalReporter(process.stdout);
  const palette = createPalette(config.color && reporter.interactive);

  reporter.line(palette.banner(' Welcome to BDIX TESTER '));
  reporter.line(palette.dim('Starting up...'));

  const session = new Session({ config, reporter, palette });
  if (!(await session.loadSource(false))) {
    reporter.line(palette.red('Failed to initialize. Please check your internet connection.'));
    return 1;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  // Ctrl-C stops a running batch; otherwise it ends the program.
  rl.on('SIGINT', () => {
    if (!session.abortBatch()) rl.close();
  });

  try {
    await runMenu(session, { prompt: createPrompt(rl), reporter, palette });
  } finally {
    rl.close();
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('fatal:', err);
    process.exitCode = 1;
  },
);
