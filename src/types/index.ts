export type ListingSource = 'estatesales' | 'rss';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface ListingScore {
  score: number; // 1..5
  summary: string;
  highlights: string[];
  categories: string[];
}

export interface Listing {
  title: string;
  address: string;
  date_range: string[];
  description: string;
  listed_by: string | null;
  url: string;
  source: ListingSource;
  coordinates: Coordinates | null;
  score?: ListingScore;
}

// Flat row written to scraped_sales.json and pushed to the front-end table.
export interface ListingRecord {
  title: string;
  address: string;
  date_range: string[];
  description: string;
  listed_by: string | null;
  url: string;
  source: ListingSource;
  latitude: number | null;
  longitude: number | null;
  score?: number;
  score_summary?: string;
  score_highlights?: string[];
}

export interface SearchQuery {
  input: string;
  city: string | null;
  state: string | null;
  zip: string | null;
  radiusMiles: number;
  limit: number;
  label: string;
}

export interface ParseResult {
  listings: Listing[];
  rows: number;
  skipped: number;
}

/**
 * One listing site or feed: where the search starts, how a page turns into
 * listings, and where the next page is.
 */
export interface ListingSourceAdapter {
  getMeta(): { name: ListingSource };
  startUrl(query: SearchQuery): string;
  parsePage(body: string, pageUrl: string): ParseResult;
  nextPageUrl(body: string, pageUrl: string): string | null;
}

export interface RunSummary {
  query: SearchQuery;
  pages: number;
  found: number;
  duplicates: number;
  geocoded: number;
  scored: number;
  skippedRows: number;
  errors: string[];
  outputs: { json: string; txt: string };
}
