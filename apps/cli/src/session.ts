import {
  BatchAbortedError,
  collectBatch,
  probeAll,
  summarizeBatch,
  type BatchSummary,
} from '@peerprobe/prober';

import type { AppConfig } from './env';
import { PersistenceError, SourceUnavailableError } from './errors';
import type { Palette } from './output/colors';
import { startProgress } from './output/progress';
import type { Reporter } from './output/reporter';
import { formatResultLine, printSummary, saveWorkingSet } from './results';
import { parseTimeoutInput, timeoutToMs } from './settings';
import { loadEndpoints } from './source';

export type SessionDeps = {
  config: AppConfig;
  reporter: Reporter;
  palette: Palette;
  now?: () => Date;
};

/**
 * State of one interactive run: the loaded endpoint list, the probe timeout and the
 * working set of the last completed batch. Only the session mutates these; probes
 * report back through the prober's result stream.
 */
export class Session {
  private endpointList: string[] = [];
  private lastWorkingSet: string[] = [];
  private timeout: number;
  private running: AbortController | null = null;

  constructor(private readonly deps: SessionDeps) {
    this.timeout = deps.config.timeoutSec;
  }

  get endpoints(): readonly string[] {
    return this.endpointList;
  }

  get workingSet(): readonly string[] {
    return this.lastWorkingSet;
  }

  get timeoutSec(): number {
    return this.timeout;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  async loadSource(refresh: boolean): Promise<boolean> {
    const { config, reporter, palette } = this.deps;

    try {
      const loaded = await loadEndpoints(
        {
          sourceUrl: config.sourceUrl,
          cachePath: config.cachePath,
          timeoutMs: config.sourceTimeoutMs,
        },
        { refresh },
      );

      if (loaded.origin === 'remote') {
        reporter.line(palette.green(`Successfully downloaded ${config.cachePath}`));
      }
      if (loaded.warning !== null) {
        reporter.line(palette.yellow(`${loaded.warning}. Using the cached list.`));
      }

      this.endpointList = loaded.endpoints;
      reporter.line(palette.green(`Successfully loaded ${loaded.endpoints.length} websites`));
      return true;
    } catch (err) {
      if (err instanceof SourceUnavailableError) {
        reporter.line(palette.red(err.message));
        return false;
      }
      throw err;
    }
  }

  setTimeoutFromInput(raw: string): boolean {
    const { reporter, palette } = this.deps;
    const parsed = parseTimeoutInput(raw);
    if (parsed === null) {
      reporter.line(
        palette.red(`Invalid timeout value "${raw}". Keeping ${this.timeout} seconds.`),
      );
      return false;
    }

    this.timeout = parsed;
    reporter.line(palette.green(`Timeout set to ${parsed} seconds`));
    return true;
  }

  /**
   * Probes the loaded endpoints and replaces the stored working set once every probe
   * has finished. Returns null when no batch ran or the batch was aborted.
   */
  async runBatch(): Promise<BatchSummary | null> {
    const { config, reporter, palette } = this.deps;

    if (this.running) {
      reporter.line(palette.yellow('A test run is already in progress.'));
      return null;
    }

    reporter.line(palette.banner(' BDIX TESTER '));
    reporter.line(palette.dim('Testing BDIX Connectivity'));

    if (this.endpointList.length === 0) {
      if (!(await this.loadSource(false))) {
        reporter.line(palette.red('No websites loaded. Please check your internet connection.'));
        return null;
      }
      reporter.line(palette.green('Successfully reloaded websites.'));
    }

    const endpoints = [...this.endpointList];
    const controller = new AbortController();
    const progress = startProgress(reporter, endpoints.length, 'Testing websites...', palette);
    this.running = controller;

    try {
      const results = await collectBatch(
        probeAll(endpoints, {
          timeoutMs: timeoutToMs(this.timeout),
          concurrency: config.concurrency,
          signal: controller.signal,
          onResult: (result) => {
            if (controller.signal.aborted) return;
            progress.tick();
            reporter.line(formatResultLine(result, palette));
          },
        }),
      );
      progress.stop();

      const summary = summarizeBatch(results);
      this.lastWorkingSet = summary.workingSet;
      printSummary(reporter, summary, palette);
      return summary;
    } catch (err) {
      if (err instanceof BatchAbortedError) {
        progress.stop();
        reporter.line(palette.yellow('Test run aborted. No results were kept.'));
        return null;
      }
      throw err;
    } finally {
      progress.stop();
      this.running = null;
    }
  }

  // Returns true when a running batch was signalled to stop.
  abortBatch(): boolean {
    if (!this.running) return false;
    this.running.abort();
    return true;
  }

  async saveResults(): Promise<string | null> {
    const { config, reporter, palette, now = () => new Date() } = this.deps;

    if (this.lastWorkingSet.length === 0) {
      reporter.line('No results to save. Please run the tests first.');
      return null;
    }

    try {
      const filePath = await saveWorkingSet(config.dataDir, this.lastWorkingSet, now());
      reporter.line(palette.green(`Results saved to ${filePath}`));
      return filePath;
    } catch (err) {
      if (err instanceof PersistenceError) {
        reporter.line(palette.red(`Error saving results: ${err.message}`));
        return null;
      }
      throw err;
    }
  }
}
