import { errorMessage } from '../../errors';
import type { Listing, ListingSourceAdapter, RunSummary, SearchQuery } from '../../types';
import { createLogger, type Logger } from '../../utils/logger';
import type { SummaryNotifier } from '../alerts/notify';
import { selectForSummary } from '../alerts/notify';
import type { GeocodeCache } from '../geocoding/cache';
import { geocodeListings, type Geocoder } from '../geocoding/geocoder';
import { writeListings, type OutputPaths } from '../output/writer';
import { scoreListings, type ListingScorer } from '../scoring/scorer';
import type { ListingSink } from '../sync/supabaseSink';
import type { PageFetcher } from './fetcher';
import { resolveLocation, type LocationDefaults } from './location';
import { listingKey } from './url';

export interface EngineOptions {
  adapter: ListingSourceAdapter;
  /** Built per run so the fetcher can name debug dumps after the query. */
  createFetcher: (query: SearchQuery) => PageFetcher;
  defaults: LocationDefaults;
  output: OutputPaths;
  geocoding?: { geocoder: Geocoder; cache: GeocodeCache } | null;
  scorer?: ListingScorer | null;
  sink?: ListingSink | null;
  notifier?: SummaryNotifier | null;
  minAlertScore?: number;
  write?: (listings: Listing[], paths: OutputPaths) => Promise<OutputPaths>;
  log?: Logger;
}

/** Keep the first listing for each listing key, in document order. */
export function dedupeListings(listings: Listing[]): { listings: Listing[]; duplicates: number } {
  const seen = new Set<string>();
  const out: Listing[] = [];
  for (const l of listings) {
    const key = listingKey(l.url);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(l);
  }
  return { listings: out, duplicates: listings.length - out.length };
}

export class ScrapeEngine {
  private readonly opts: EngineOptions;
  private readonly log: Logger;

  constructor(opts: EngineOptions) {
    this.opts = opts;
    this.log = opts.log ?? createLogger('engine');
  }

  /**
   * One full run: resolve -> fetch/parse -> dedupe -> geocode -> score ->
   * write -> sync -> notify. Input, first-page fetch and output errors are
   * thrown; everything after the files are written is recorded in errors.
   */
  async run(locationInput: string, overrides: { limit?: number } = {}): Promise<RunSummary> {
    const { adapter } = this.opts;
    const name = adapter.getMeta().name;
    const query = resolveLocation(locationInput, {
      ...this.opts.defaults,
      limit: overrides.limit ?? this.opts.defaults.limit,
    });
    this.log.info(`Searching ${name} for sales in ${query.label}`);

    const startUrl = adapter.startUrl(query);
    this.log.info('Start URL:', startUrl);
    const fetcher = this.opts.createFetcher(query);

    const collected: Listing[] = [];
    let pages = 0;
    let skippedRows = 0;
    for await (const page of fetcher.pages(startUrl, (body, url) => adapter.nextPageUrl(body, url))) {
      pages++;
      const parsed = adapter.parsePage(page.body, page.url);
      skippedRows += parsed.skipped;
      collected.push(...parsed.listings);
      this.log.info(`Page ${page.page}: ${parsed.rows} rows, ${parsed.listings.length} listings${parsed.skipped ? `, ${parsed.skipped} skipped` : ''}`);
      if (parsed.rows === 0) break;
    }

    const { listings: unique, duplicates } = dedupeListings(collected);
    let listings = unique.slice(0, query.limit);
    this.log.info(`Found ${unique.length} unique listings (${duplicates} duplicates), keeping ${listings.length}`);

    const errors: string[] = [];
    let geocoded = 0;
    if (this.opts.geocoding && listings.length) {
      const { geocoder, cache } = this.opts.geocoding;
      const result = await geocodeListings(listings, geocoder);
      listings = result.listings;
      geocoded = result.geocoded;
      try {
        await cache.save();
      } catch (err) {
        this.log.warn('Could not save geocode cache:', errorMessage(err));
        errors.push(`geocode cache: ${errorMessage(err)}`);
      }
    }

    let scored = 0;
    if (this.opts.scorer && listings.length) {
      const result = await scoreListings(listings, this.opts.scorer, this.log);
      listings = result.listings;
      scored = result.scored;
      if (result.failed) errors.push(`scoring: ${result.failed} listing(s) left unscored`);
    }

    const write = this.opts.write ?? writeListings;
    const outputs = await write(listings, this.opts.output);
    this.log.info(`Saved ${listings.length} listings to ${outputs.jsonPath} and ${outputs.txtPath}`);

    if (this.opts.sink) {
      try {
        await this.opts.sink.push(listings);
      } catch (err) {
        this.log.error('Sync failed:', errorMessage(err));
        errors.push(`sync: ${errorMessage(err)}`);
      }
    }

    if (this.opts.notifier) {
      const selected = selectForSummary(listings, this.opts.minAlertScore ?? 4);
      if (selected.length) {
        try {
          await this.opts.notifier.send(selected, { location: query.label });
          this.log.info(`Sent summary of ${selected.length} listings`);
        } catch (err) {
          this.log.error('Notification failed:', errorMessage(err));
          errors.push(`notify: ${errorMessage(err)}`);
        }
      } else {
        this.log.info('No listings met the alert threshold; no summary sent');
      }
    }

    return {
      query,
      pages,
      found: listings.length,
      duplicates,
      geocoded,
      scored,
      skippedRows,
      errors,
      outputs: { json: outputs.jsonPath, txt: outputs.txtPath },
    };
  }
}
