import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createPalette } from '../src/output/colors';
import { Session } from '../src/session';
import { buildConfig, makeTempDir, removeTempDir } from './helpers/fixtures';
import { createMemoryReporter, type MemoryReporter } from './helpers/memory-reporter';

const NOW = new Date(2026, 0, 2, 3, 4, 5);

function hostFetch(responses: Record<string, number>) {
  return vi.fn(async (url: string) => {
    const status = responses[url];
    if (status === undefined) throw new TypeError('fetch failed');
    return new Response('ok', { status });
  });
}

function hangingFetch() {
  return vi.fn((_url: string, init?: RequestInit) => {
    return new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        const err = new Error('aborted');
        err.name = 'AbortError';
        reject(err);
      });
    });
  });
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('session', () => {
  let dir: string;
  let reporter: MemoryReporter;

  function createSession(overrides: Parameters<typeof buildConfig>[1] = {}): Session {
    return new Session({
      config: buildConfig(dir, overrides),
      reporter,
      palette: createPalette(false),
      now: () => NOW,
    });
  }

  async function writeCache(lines: string[]): Promise<void> {
    await fs.writeFile(path.join(dir, 'bdix.txt'), `${lines.join('\n')}\n`, 'utf8');
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    reporter = createMemoryReporter();
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('loads the list on demand and reports every probe plus a summary', async () => {
    await writeCache(['a.example', 'https://b.example', 'bad.invalid']);
    vi.stubGlobal('fetch', hostFetch({ 'http://a.example': 200, 'https://b.example': 200 }));
    const session = createSession();

    const summary = await session.runBatch();

    expect(summary).toMatchObject({ total: 3, working: 2, failed: 1 });
    expect(new Set(session.workingSet)).toEqual(new Set(['http://a.example', 'https://b.example']));
    expect(reporter.lines.slice(0, 4)).toEqual([
      ' BDIX TESTER ',
      'Testing BDIX Connectivity',
      'Successfully loaded 3 websites',
      'Successfully reloaded websites.',
    ]);
    expect(new Set(reporter.lines.slice(4, 7))).toEqual(
      new Set([
        '✓ http://a.example is working',
        '✓ https://b.example is working',
        '✗ http://bad.invalid is not working',
      ]),
    );
    expect(reporter.lines.slice(7)).toEqual([
      '',
      'Test Results:',
      'Total sites tested: 3',
      'Working sites: 2',
      'Failed sites: 1',
    ]);
  });

  it('does not probe when no endpoints are available', async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    vi.stubGlobal('fetch', fetchMock);
    const session = createSession();

    await expect(session.runBatch()).resolves.toBeNull();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(reporter.lines).toEqual([
      ' BDIX TESTER ',
      'Testing BDIX Connectivity',
      'No endpoints available (Download failed: fetch failed)',
      'No websites loaded. Please check your internet connection.',
    ]);
  });

  it('keeps the previous timeout after invalid input and probes with it', async () => {
    await writeCache(['a.example', 'b.example']);
    const session = createSession();
    await session.loadSource(false);

    expect(session.setTimeoutFromInput('abc')).toBe(false);
    expect(session.timeoutSec).toBe(5);
    expect(reporter.lines).toContain('Invalid timeout value "abc". Keeping 5 seconds.');

    vi.useFakeTimers();
    const fetchMock = hangingFetch();
    vi.stubGlobal('fetch', fetchMock);

    let settled = false;
    const batch = session.runBatch().then((summary) => {
      settled = true;
      return summary;
    });

    await vi.advanceTimersByTimeAsync(4_999);
    expect(settled).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1);
    await expect(batch).resolves.toMatchObject({ total: 2, working: 0, failed: 2 });
  });

  it('rejects a timeout above one hour and keeps probing with the current one', async () => {
    await writeCache(['a.example']);
    const session = createSession();
    await session.loadSource(false);

    expect(session.setTimeoutFromInput('3000000')).toBe(false);
    expect(session.timeoutSec).toBe(5);
    expect(reporter.lines).toContain('Invalid timeout value "3000000". Keeping 5 seconds.');

    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string) =>
          new Promise<Response>((resolve) => {
            setTimeout(() => resolve(new Response('ok', { status: 200 })), 30);
          }),
      ),
    );

    await expect(session.runBatch()).resolves.toMatchObject({ total: 1, working: 1, failed: 0 });
  });

  it('applies a valid timeout to later batches', async () => {
    await writeCache(['a.example']);
    const session = createSession();
    await session.loadSource(false);

    expect(session.setTimeoutFromInput('0.5')).toBe(true);
    expect(reporter.lines).toContain('Timeout set to 0.5 seconds');

    vi.useFakeTimers();
    vi.stubGlobal('fetch', hangingFetch());

    let settled = false;
    const batch = session.runBatch().then((summary) => {
      settled = true;
      return summary;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await expect(batch).resolves.toMatchObject({ total: 1, failed: 1 });
  });

  it('refuses to save before any batch has produced working sites', async () => {
    const session = createSession();

    await expect(session.saveResults()).resolves.toBeNull();
    expect(reporter.lines).toEqual(['No results to save. Please run the tests first.']);
  });

  it('saves the working set of the last batch', async () => {
    await writeCache(['a.example', 'https://b.example', 'bad.invalid']);
    vi.stubGlobal('fetch', hostFetch({ 'http://a.example': 200, 'https://b.example': 200 }));
    const session = createSession();
    await session.runBatch();

    const filePath = await session.saveResults();

    expect(filePath).toBe(path.join(dir, 'working_sites_20260102_030405.txt'));
    expect(reporter.lines.at(-1)).toBe(`Results saved to ${filePath}`);
    const saved = await fs.readFile(path.join(dir, 'working_sites_20260102_030405.txt'), 'utf8');
    expect(new Set(saved.split('\n').filter(Boolean))).toEqual(
      new Set(['http://a.example', 'https://b.example']),
    );
  });

  it('keeps the working set after a failed save so it can be retried', async () => {
    await writeCache(['a.example']);
    vi.stubGlobal('fetch', hostFetch({ 'http://a.example': 200 }));
    const outDir = path.join(dir, 'results');
    const session = createSession({ dataDir: outDir, cachePath: path.join(dir, 'bdix.txt') });
    await session.runBatch();

    await expect(session.saveResults()).resolves.toBeNull();
    expect(reporter.lines.at(-1)).toMatch(/^Error saving results: Cannot write /);
    expect(session.workingSet).toEqual(['http://a.example']);

    await fs.mkdir(outDir);
    await expect(session.saveResults()).resolves.toBe(
      path.join(outDir, 'working_sites_20260102_030405.txt'),
    );
  });

  it('discards an aborted batch and keeps the previous working set', async () => {
    await writeCache(['a.example', 'b.example']);
    vi.stubGlobal('fetch', hostFetch({ 'http://a.example': 200 }));
    const session = createSession();
    await session.runBatch();
    expect(session.workingSet).toEqual(['http://a.example']);
    expect(session.abortBatch()).toBe(false);

    session.setTimeoutFromInput('0.05');
    vi.stubGlobal('fetch', hangingFetch());
    reporter.lines.length = 0;

    const batch = session.runBatch();
    await flush();
    expect(session.isRunning).toBe(true);
    expect(session.abortBatch()).toBe(true);

    await expect(batch).resolves.toBeNull();
    expect(session.isRunning).toBe(false);
    expect(session.workingSet).toEqual(['http://a.example']);
    expect(reporter.lines).toEqual([
      ' BDIX TESTER ',
      'Testing BDIX Connectivity',
      'Test run aborted. No results were kept.',
    ]);

    // In-flight probes time out on their own and must not print anything.
    await new Promise((resolve) => setTimeout(resolve, 80));
    expect(reporter.lines).toHaveLength(3);
  });

  it('falls back to the cached list when a reload cannot download', async () => {
    await writeCache(['a.example']);
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );
    const session = createSession();

    await expect(session.loadSource(true)).resolves.toBe(true);

    expect(session.endpoints).toEqual(['a.example']);
    expect(reporter.lines).toEqual([
      'Download failed: fetch failed. Using the cached list.',
      'Successfully loaded 1 websites',
    ]);
  });

  it('announces a fresh download', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('a.example\nb.example\n', { status: 200 })));
    const session = createSession();

    await expect(session.loadSource(true)).resolves.toBe(true);

    expect(reporter.lines).toEqual([
      `Successfully downloaded ${path.join(dir, 'bdix.txt')}`,
      'Successfully loaded 2 websites',
    ]);
  });
});
