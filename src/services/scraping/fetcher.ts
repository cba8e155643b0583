import { promises as fs } from 'fs';
import * as path from 'path';
import { FetchError, errorMessage } from '../../errors';
import { createLogger, sleep as realSleep, type Logger } from '../../utils/logger';
import { getText, type FetchPolicy, type HttpGet } from './http';

export interface FetchedPage {
  page: number;
  url: string;
  body: string;
}

export interface PageFetcherOptions {
  policy: FetchPolicy;
  timeoutMs: number;
  maxPages: number;
  /** Directory for raw page dumps; dumps are off when unset. */
  debugDir?: string | null;
  /** Name the dumps are filed under, usually the query label. */
  debugLabel?: string;
  get?: HttpGet;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
}

export function debugFileName(label: string, page: number): string {
  const slug = label.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'search';
  return `estatesales_debug_${slug}_p${page}.html`;
}

export class PageFetcher {
  private readonly policy: FetchPolicy;
  private readonly timeoutMs: number;
  private readonly maxPages: number;
  private readonly debugDir: string | null;
  private readonly debugLabel: string;
  private readonly get: HttpGet;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(opts: PageFetcherOptions) {
    this.policy = opts.policy;
    this.timeoutMs = opts.timeoutMs;
    this.maxPages = Math.max(1, Math.floor(opts.maxPages));
    this.debugDir = opts.debugDir ?? null;
    this.debugLabel = opts.debugLabel ?? 'search';
    this.get = opts.get ?? getText;
    this.sleep = opts.sleep ?? realSleep;
    this.log = opts.log ?? createLogger('fetch');
  }

  async fetchPage(url: string, page: number): Promise<FetchedPage> {
    const wait = this.policy.delayMs();
    if (wait > 0) await this.sleep(wait);
    const userAgent = this.policy.userAgent();
    this.log.info(`GET page ${page}`, url);
    const resp = await this.get(url, { headers: { 'User-Agent': userAgent }, timeoutMs: this.timeoutMs });
    if (resp.status < 200 || resp.status >= 400) {
      throw new FetchError(url, `HTTP ${resp.status} for ${url}`, { status: resp.status });
    }
    await this.dump(resp.body, page);
    return { page, url: resp.url || url, body: resp.body };
  }

  /**
   * Yield pages from startUrl, following nextPageUrl until it returns null
   * or maxPages is reached. Page 1 failures propagate; later failures end
   * the sequence.
   */
  async *pages(startUrl: string, nextPageUrl: (body: string, url: string) => string | null): AsyncGenerator<FetchedPage> {
    const seen = new Set<string>();
    let url: string | null = startUrl;
    for (let page = 1; url && page <= this.maxPages; page++) {
      seen.add(url);
      let fetched: FetchedPage;
      try {
        fetched = await this.fetchPage(url, page);
      } catch (err) {
        if (page === 1) throw err;
        this.log.warn(`page ${page} failed, treating as end of results:`, errorMessage(err));
        return;
      }
      yield fetched;
      const next = nextPageUrl(fetched.body, fetched.url);
      url = next && !seen.has(next) ? next : null;
    }
  }

  private async dump(body: string, page: number): Promise<void> {
    if (!this.debugDir) return;
    const file = path.join(this.debugDir, debugFileName(this.debugLabel, page));
    try {
      await fs.mkdir(this.debugDir, { recursive: true });
      await fs.writeFile(file, body, 'utf8');
      this.log.info('Saved page HTML to', file);
    } catch (err) {
      this.log.warn('Could not save debug HTML:', errorMessage(err));
    }
  }
}
