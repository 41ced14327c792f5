import path from 'node:path';

import * as dotenv from 'dotenv';

import { ConfigError } from './errors';
import { envSchema, type ParsedEnv } from './schemas/env';

export const CACHE_FILE_NAME = 'bdix.txt';

export type AppConfig = {
  sourceUrl: string;
  dataDir: string;
  cachePath: string;
  timeoutSec: number;
  concurrency: number;
  sourceTimeoutMs: number;
  color: boolean;
};

export type EnvSource = Record<string, string | undefined>;

function loadProcessEnv(): EnvSource {
  dotenv.config();
  return process.env;
}

function toAppConfig(env: ParsedEnv, cwd: string): AppConfig {
  const dataDir = path.resolve(cwd, env.PEERPROBE_DATA_DIR ?? '.');
  return {
    sourceUrl: env.PEERPROBE_SOURCE_URL,
    dataDir,
    cachePath: path.join(dataDir, CACHE_FILE_NAME),
    timeoutSec: env.PEERPROBE_TIMEOUT_SEC,
    concurrency: env.PEERPROBE_CONCURRENCY,
    sourceTimeoutMs: Math.round(env.PEERPROBE_SOURCE_TIMEOUT_SEC * 1000),
    color: env.NO_COLOR === undefined || env.NO_COLOR.length === 0,
  };
}

/**
 * Reads process configuration from environment variables.
 *
 * Without an explicit `env`, a `.env` file in the working directory is loaded first.
 */
export function readConfig(env: EnvSource = loadProcessEnv(), cwd = process.cwd()): AppConfig {
  const r = envSchema.safeParse(env);
  if (!r.success) {
    const details = r.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${details.join('; ')}`);
  }
  return toAppConfig(r.data, cwd);
}
