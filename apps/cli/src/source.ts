// Endpoint list loading.
//
// - Remote: a newline-delimited text file fetched over HTTP with its own timeout.
// - Cache: the last successful download, kept as `bdix.txt` in the data directory.

import fs from 'node:fs/promises';

import { USER_AGENT, isAbortError, toErrorMessage, withDeadline } from '@peerprobe/prober';

import { SourceUnavailableError } from './errors';

export type SourceConfig = {
  sourceUrl: string;
  cachePath: string;
  timeoutMs: number;
};

export type LoadedSource = {
  endpoints: string[];
  origin: 'remote' | 'cache';
  // Set when a refresh failed and the cached copy was used instead.
  warning: string | null;
};

export function parseEndpointList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readCache(cachePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(cachePath, 'utf8');
  } catch (err) {
    if (!isNotFound(err)) {
      console.warn(`source: cannot read cache ${cachePath}:`, toErrorMessage(err));
    }
    return [];
  }
  return parseEndpointList(text);
}

export async function downloadEndpointList(config: SourceConfig): Promise<string[]> {
  let text: string;
  try {
    // The deadline covers the body as well as the headers.
    text = await withDeadline(config.timeoutMs, async (signal) => {
      const res = await fetch(config.sourceUrl, {
        method: 'GET',
        headers: { 'User-Agent': USER_AGENT },
        signal,
      });
      if (!res.ok) {
        await res.body?.cancel().catch(() => undefined);
        throw new SourceUnavailableError(`Download failed: HTTP ${res.status}`);
      }
      return res.text();
    });
  } catch (err) {
    if (err instanceof SourceUnavailableError) throw err;
    if (isAbortError(err)) {
      throw new SourceUnavailableError(`Download timed out after ${config.timeoutMs}ms`, {
        cause: err,
      });
    }
    throw new SourceUnavailableError(`Download failed: ${toErrorMessage(err)}`, { cause: err });
  }

  const endpoints = parseEndpointList(text);
  if (endpoints.length === 0) {
    throw new SourceUnavailableError('Downloaded endpoint list is empty');
  }

  try {
    await fs.writeFile(config.cachePath, text, 'utf8');
  } catch (err) {
    // The list is still usable for this run.
    console.warn(`source: cannot write cache ${config.cachePath}:`, toErrorMessage(err));
  }

  return endpoints;
}

/**
 * Loads the endpoint list.
 *
 * A non-empty cache is used as is unless `refresh` is set. A refresh always tries the
 * remote list first and falls back to the cache when the download fails.
 */
export async function loadEndpoints(
  config: SourceConfig,
  opts: { refresh?: boolean } = {},
): Promise<LoadedSource> {
  if (!opts.refresh) {
    const cached = await readCache(config.cachePath);
    if (cached.length > 0) {
      return { endpoints: cached, origin: 'cache', warning: null };
    }
  }

  try {
    const endpoints = await downloadEndpointList(config);
    return { endpoints, origin: 'remote', warning: null };
  } catch (err) {
    if (!(err instanceof SourceUnavailableError)) throw err;

    if (opts.refresh) {
      const cached = await readCache(config.cachePath);
      if (cached.length > 0) {
        return { endpoints: cached, origin: 'cache', warning: err.message };
      }
    }
    throw new SourceUnavailableError(`No endpoints available (${err.message})`, { cause: err });
  }
}
