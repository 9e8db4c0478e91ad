import { USER_AGENT } from '../../config/constants';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { ensureScheme } from '../../utils/urlValidator';
import { describeError } from '../errors';
import { fetchPage as defaultFetchPage, type PageFetcher } from './pageFetcher';
import { scrapeHtml } from './pageScraper';
import type { EnrichmentResults, ScrapeResult } from './types';

export interface WebEnricherOptions {
  timeoutMs: number;
  delayMs: number;
  userAgent?: string;
  fetchPage?: PageFetcher;
  sleep?: (ms: number) => Promise<void>;
}

export interface Enricher {
  enrich(urls: readonly string[]): Promise<EnrichmentResults>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Visits the URLs a deck mentions and summarizes what each page says about
 * the company. One page at a time, with a pause after every successful fetch.
 */
export class WebEnricher implements Enricher {
  private readonly timeoutMs: number;
  private readonly delayMs: number;
  private readonly userAgent: string;
  private readonly fetchPage: PageFetcher;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: WebEnricherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.delayMs = options.delayMs;
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.fetchPage = options.fetchPage ?? defaultFetchPage;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async scrape(url: string): Promise<ScrapeResult> {
    const log = createChildLogger(generateCorrelationId());
    const target = ensureScheme(url);

    try {
      const page = await this.fetchPage(target, {
        timeoutMs: this.timeoutMs,
        userAgent: this.userAgent,
      });
      const result = scrapeHtml(page.bodyText, target);

      log.debug({ url: target, title: result.title }, 'Page scraped');

      if (this.delayMs > 0) {
        await this.sleep(this.delayMs);
      }
      return { ...result, url };
    } catch (error) {
      const message = describeError(error);
      log.warn({ url: target, error: message }, 'Failed to scrape page');
      return { url, status: 'error', error: message };
    }
  }

  async enrich(urls: readonly string[]): Promise<EnrichmentResults> {
    const results: EnrichmentResults = new Map();
    const unique = Array.from(new Set(urls));

    for (const url of unique) {
      results.set(url, await this.scrape(url));
    }

    const failed = Array.from(results.values()).filter(result => result.status === 'error').length;
    createChildLogger(generateCorrelationId()).info(
      { total: results.size, failed },
      'Web enrichment finished'
    );

    return results;
  }
}
