import * as cheerio from 'cheerio';
import type { Listing, ListingSourceAdapter, ParseResult, SearchQuery } from '../../../types';
import { fillFeedUrl } from '../location';
import { absoluteUrl } from '../url';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

function clean(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

// Tried in order; the first capture that survives cleanup wins.
const LOCATION_PATTERNS: RegExp[] = [
  /\(([^)]+)\)\s*$/,
  /\b[Ii]n\s+([A-Za-z .'-]+,\s*[A-Z]{2}(?:\s+\d{5})?)\b/,
  /([A-Za-z .'-]+,\s*[A-Z]{2}(?:\s+\d{5})?)\b/,
  /\s-\s*([A-Za-z .'-]+)$/,
  /@\s*([A-Za-z .'-]+)/,
];

const NOISE_WORDS = /\b(estate|garage|moving|yard|sale|sales)\b/gi;

/** Best-effort place name from a feed title, e.g. "Estate Sale in Flint, MI" -> "Flint, MI". */
export function extractLocationFromTitle(title: string): string {
  for (const re of LOCATION_PATTERNS) {
    const m = title.match(re);
    if (!m) continue;
    const place = clean(m[1].replace(NOISE_WORDS, ' ')).replace(/^[\s,-]+/, '');
    if (place.length > 2) return place;
  }
  return '';
}

/** Normalize a feed timestamp to YYYY-MM-DD, keeping the calendar date as written. */
export function formatFeedDate(raw: string): string | null {
  const s = clean(raw);
  if (!s) return null;
  const iso = s.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;
  const rfc = s.match(/(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\.?\s+(\d{4})/);
  if (rfc) {
    const month = MONTHS.indexOf(rfc[2].toLowerCase());
    if (month >= 0) return `${rfc[3]}-${String(month + 1).padStart(2, '0')}-${rfc[1].padStart(2, '0')}`;
  }
  const t = Date.parse(s);
  if (!Number.isNaN(t)) return new Date(t).toISOString().slice(0, 10);
  return s.length >= 10 ? s.slice(0, 10) : s;
}

function htmlToText(fragment: string): string {
  if (!/[<&]/.test(fragment)) return clean(fragment);
  return clean(cheerio.load(fragment).root().text());
}

/** RSS 2.0 <item> and Atom <entry> elements become listings. */
export function parseSalesFeed(xml: string, feedUrl: string): ParseResult {
  const $ = cheerio.load(xml, { xml: true });
  const listings: Listing[] = [];
  let rows = 0;
  let skipped = 0;

  $('item, entry').each((_i, el) => {
    rows++;
    const $el = $(el);
    const child = (selector: string) => $el.children(selector).first();

    const title = htmlToText(child('title').text());
    const $link = child('link');
    const url = absoluteUrl($link.attr('href') || $link.text(), feedUrl);
    if (!title || !url) {
      skipped++;
      return;
    }

    const rawDate = child('pubDate').text() || child('dc\\:date').text() || child('published').text() || child('updated').text();
    const date = formatFeedDate(rawDate);
    const description = htmlToText(child('description').text() || child('summary').text() || child('content').text());

    listings.push({
      title,
      address: extractLocationFromTitle(title),
      date_range: date ? [date] : [],
      description,
      listed_by: null,
      url,
      source: 'rss',
      coordinates: null,
    });
  });

  return { listings, rows, skipped };
}

export class RssFeedAdapter implements ListingSourceAdapter {
  constructor(private readonly feedUrlTemplate: string) {}

  getMeta() { return { name: 'rss' as const }; }

  startUrl(query: SearchQuery): string {
    return fillFeedUrl(this.feedUrlTemplate, query);
  }

  parsePage(body: string, pageUrl: string): ParseResult {
    return parseSalesFeed(body, pageUrl);
  }

  nextPageUrl(): string | null {
    return null;
  }
}
