import fs from 'node:fs/promises';
import path from 'node:path';

import { format } from 'date-fns';

import { toErrorMessage, type BatchSummary, type ProbeResult } from '@peerprobe/prober';

import { PersistenceError } from './errors';
import type { Palette } from './output/colors';
import type { Reporter } from './output/reporter';
import { parseEndpointList } from './source';

export function formatResultLine(result: ProbeResult, palette: Palette): string {
  if (result.reachable) {
    return palette.green(`✓ ${result.endpoint} is working`);
  }
  return palette.red(`✗ ${result.endpoint} is not working`);
}

export function printSummary(reporter: Reporter, summary: BatchSummary, palette: Palette): void {
  reporter.line('');
  reporter.line(palette.bold('Test Results:'));
  reporter.line(`Total sites tested: ${summary.total}`);
  reporter.line(`Working sites: ${summary.working}`);
  reporter.line(`Failed sites: ${summary.failed}`);
}

export function workingSetFileName(now: Date): string {
  return `working_sites_${format(now, 'yyyyMMdd_HHmmss')}.txt`;
}

// Writes one endpoint per line and returns the path of the new file.
export async function saveWorkingSet(
  dir: string,
  workingSet: readonly string[],
  now: Date,
): Promise<string> {
  const filePath = path.join(dir, workingSetFileName(now));
  const body = workingSet.map((endpoint) => `${endpoint}\n`).join('');

  try {
    await fs.writeFile(filePath, body, 'utf8');
  } catch (err) {
    throw new PersistenceError(`Cannot write ${filePath}: ${toErrorMessage(err)}`, { cause: err });
  }
  return filePath;
}

export async function readWorkingSet(filePath: string): Promise<string[]> {
  return parseEndpointList(await fs.readFile(filePath, 'utf8'));
}
