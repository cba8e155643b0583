import * as cheerio from 'cheerio';
import type { Listing, ListingSourceAdapter, ParseResult, SearchQuery } from '../../../types';
import { buildSearchUrl } from '../location';
import { absoluteUrl } from '../url';

const MONTH_RE = /(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)/;

function clean(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

function stripListedBy(text: string): string | null {
  const t = clean(text);
  if (!t) return null;
  const m = t.match(/\bby\s+(.+)$/i);
  return m ? m[1].trim() : t;
}

/**
 * Extract listings from one EstateSales.net results page. Each sale is an
 * <app-sale-row> component; rows without a title or link are skipped.
 */
export function parseSalesPage(html: string, pageUrl: string): ParseResult {
  const $ = cheerio.load(html);
  const listings: Listing[] = [];
  let rows = 0;
  let skipped = 0;

  $('app-sale-row').each((_i, row) => {
    rows++;
    const $row = $(row);

    // Own text of the component and of each div/span under it, in document order
    const textRuns = (selector: string): string[] =>
      $row
        .find(selector)
        .first()
        .find('div, span')
        .addBack()
        .map((_j, el) =>
          clean(
            $(el)
              .contents()
              .filter((_k, node) => node.nodeType === 3)
              .text(),
          ),
        )
        .get()
        .filter((t) => t.length > 0);

    const title = clean($row.find('h3').first().text());
    const url = absoluteUrl($row.find('a.sale-row').first().attr('href'), pageUrl);
    if (!title || !url) {
      skipped++;
      return;
    }

    let dateRange: string[] = [];
    const $date = $row.find('app-sale-date').first();
    if ($date.length) {
      const parts = textRuns('app-sale-date');
      const withMonth = parts.filter((p) => MONTH_RE.test(p));
      const whole = clean($date.text());
      dateRange = withMonth.length ? withMonth : (whole ? [whole] : []);
    }

    listings.push({
      title,
      address: textRuns('app-sale-address').join(', '),
      date_range: dateRange,
      description: clean($row.find('.sale-row__recent-info').first().text()),
      listed_by: stripListedBy($row.find('.sale-row__listed-by').first().text()),
      url,
      source: 'estatesales',
      coordinates: null,
    });
  });

  return { listings, rows, skipped };
}

export function nextSalesPageUrl(html: string, pageUrl: string): string | null {
  const $ = cheerio.load(html);
  const href = $('link[rel="next"]').first().attr('href') || $('a[rel="next"]').first().attr('href');
  return absoluteUrl(href, pageUrl);
}

export class EstateSalesAdapter implements ListingSourceAdapter {
  constructor(private readonly baseUrl: string) {}

  getMeta() { return { name: 'estatesales' as const }; }

  startUrl(query: SearchQuery): string {
    return buildSearchUrl(this.baseUrl, query);
  }

  parsePage(body: string, pageUrl: string): ParseResult {
    return parseSalesPage(body, pageUrl);
  }

  nextPageUrl(body: string, pageUrl: string): string | null {
    return nextSalesPageUrl(body, pageUrl);
  }
}
