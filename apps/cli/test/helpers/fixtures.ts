import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { AppConfig } from '../../src/env';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'peerprobe-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function buildConfig(dataDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    sourceUrl: 'https://lists.example/bdix.txt',
    dataDir,
    cachePath: path.join(dataDir, 'bdix.txt'),
    timeoutSec: 5,
    concurrency: 10,
    sourceTimeoutMs: 10_000,
    color: false,
    ...overrides,
  };
}
