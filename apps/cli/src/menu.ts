import { toErrorMessage } from '@peerprobe/prober';

import type { Palette } from './output/colors';
import type { Reporter } from './output/reporter';
import { DEFAULT_TIMEOUT_SEC } from './settings';

export type MenuCommand = 'run' | 'save' | 'timeout' | 'reload' | 'exit';

export const MENU_ITEMS = [
  { key: '1', label: 'Start Testing', command: 'run' },
  { key: '2', label: 'Save Working Sites', command: 'save' },
  { key: '3', label: 'Set Timeout', command: 'timeout' },
  { key: '4', label: 'Reload BDIX List', command: 'reload' },
  { key: '5', label: 'Exit', command: 'exit' },
] as const satisfies ReadonlyArray<{ key: string; label: string; command: MenuCommand }>;

// Resolves to null once input has ended.
export type Prompt = (question: string) => Promise<string | null>;

// The part of `Session` the menu drives.
export type MenuSession = {
  runBatch(): Promise<unknown>;
  saveResults(): Promise<unknown>;
  setTimeoutFromInput(raw: string): boolean;
  loadSource(refresh: boolean): Promise<boolean>;
};

export type MenuIo = {
  prompt: Prompt;
  reporter: Reporter;
  palette: Palette;
};

export function parseMenuChoice(input: string): MenuCommand | null {
  const key = input.trim();
  const item = MENU_ITEMS.find((i) => i.key === key);
  return item ? item.command : null;
}

export async function dispatchCommand(
  session: MenuSession,
  command: MenuCommand,
  io: MenuIo,
): Promise<'continue' | 'exit'> {
  const { prompt, reporter } = io;

  switch (command) {
    case 'run':
      await session.runBatch();
      return 'continue';
    case 'save':
      await session.saveResults();
      return 'continue';
    case 'timeout': {
      const raw = await prompt(`Enter timeout in seconds (default is ${DEFAULT_TIMEOUT_SEC}): `);
      if (raw === null) return 'exit';
      session.setTimeoutFromInput(raw);
      return 'continue';
    }
    case 'reload':
      if (await session.loadSource(true)) {
        reporter.line('Successfully reloaded BDIX list.');
      } else {
        reporter.line('Failed to reload BDIX list.');
      }
      return 'continue';
    case 'exit':
      return 'exit';
  }
}

export async function runMenu(session: MenuSession, io: MenuIo): Promise<void> {
  const { prompt, reporter, palette } = io;

  while (true) {
    reporter.line('');
    for (const item of MENU_ITEMS) {
      reporter.line(`${item.key}. ${item.label}`);
    }

    const choice = await prompt('\nEnter your choice (1-5): ');
    const command = choice === null ? 'exit' : parseMenuChoice(choice);
    if (command === null) {
      reporter.line('Invalid choice. Please try again.');
      continue;
    }

    let next: 'continue' | 'exit';
    try {
      next = await dispatchCommand(session, command, io);
    } catch (err) {
      console.error(`menu: ${command} failed`, err);
      reporter.line(palette.red(`Error: ${toErrorMessage(err)}`));
      next = 'continue';
    }

    if (next === 'exit') {
      reporter.line('Thank you for using BDIX Tester!');
      return;
    }
  }
}
