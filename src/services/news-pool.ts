import { getErrorMessage } from '../utils/error-utils.js';

import { logDebug, logError, logInfo } from './logger.js';
import type { Source } from './source.js';

export interface NewsPoolJob {
  source: Source;
  /** Concurrent article downloads for this source. */
  threads?: number;
}

export interface NewsPoolReport {
  url: string;
  ok: boolean;
  articles: number;
  error?: string;
}

/**
 * Downloads and parses the articles of several sources at once. Each source
 * runs with its own concurrency limit; `join()` resolves once every source
 * has settled, whatever the outcome.
 */
export class NewsPool {
  private readonly jobs: readonly NewsPoolJob[];
  private pending: Promise<NewsPoolReport[]> | null = null;

  constructor(jobs: readonly NewsPoolJob[]) {
    this.jobs = jobs;
  }

  /** Starts every job; calling it again while jobs run changes nothing. */
  run(): void {
    if (this.pending) return;
    logInfo('News pool started', { sources: this.jobs.length });
    this.pending = Promise.all(this.jobs.map(async (job) => this.runJob(job)));
  }

  async join(): Promise<NewsPoolReport[]> {
    this.run();
    const reports = await (this.pending ?? Promise.resolve([]));
    this.pending = null;
    logInfo('News pool finished', {
      sources: reports.length,
      failed: reports.filter((report) => !report.ok).length,
    });
    return reports;
  }

  private async runJob({ source, threads }: NewsPoolJob): Promise<NewsPoolReport> {
    try {
      await source.downloadArticles(threads ?? 1);
      source.parseArticles();
      logDebug('News pool source done', {
        url: source.url,
        articles: source.size(),
      });
      return { url: source.url, ok: true, articles: source.size() };
    } catch (error) {
      const message = getErrorMessage(error);
      logError('News pool source failed', { url: source.url, error: message });
      return { url: source.url, ok: false, articles: source.size(), error: message };
    }
  }
}
