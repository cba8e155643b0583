import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { EstateSalesAdapter, nextSalesPageUrl, parseSalesPage } from '../src/services/scraping/sites/estateSales';

const PAGE_URL = 'https://www.estatesales.net/MI/Grand-Blanc/48439';
const html = readFileSync(fileURLToPath(new URL('./fixtures/sales-page.html', import.meta.url)), 'utf8');

describe('parseSalesPage', () => {
  const result = parseSalesPage(html, PAGE_URL);

  it('counts rows and skips the one without a title', () => {
    expect(result.rows).toBe(5);
    expect(result.skipped).toBe(1);
    expect(result.listings).toHaveLength(4);
  });

  it('extracts every field of a complete row', () => {
    expect(result.listings[0]).toEqual({
      title: 'Mid-Century Home Full of Treasures',
      address: '123 Main St, Grand Blanc, MI 48439',
      date_range: ['Fri, Oct 17', 'Sun, Oct 19'],
      description: 'Furniture, tools and vintage records',
      listed_by: 'Blue Water Estate Services',
      url: 'https://www.estatesales.net/MI/Grand-Blanc/48439/1001',
      source: 'estatesales',
      coordinates: null,
    });
  });

  it('reads a plain-text address and leaves listed_by null when absent', () => {
    const second = result.listings[1];
    expect(second.address).toBe('456 Oak Ave, Flint, MI 48507');
    expect(second.date_range).toEqual(['Sat, Oct 18']);
    expect(second.listed_by).toBeNull();
    expect(second.url).toBe('https://www.estatesales.net/MI/Flint/48507/1002');
  });

  it('keeps a row without a description, using the whole date text when no month appears', () => {
    const third = result.listings[2];
    expect(third.title).toBe('Farmhouse Contents');
    expect(third.description).toBe('');
    expect(third.address).toBe('789 Lake Rd');
    expect(third.date_range).toEqual(['Starts Saturday']);
    expect(third.listed_by).toBe('Heritage Sales');
  });

  it('keeps text that sits beside nested elements in the address', () => {
    const fourth = result.listings[3];
    expect(fourth.address).toBe('123 Elm St, Flint, MI, 48507');
    expect(fourth.date_range).toEqual(['Sat, Oct 25']);
    expect(fourth.url).toBe('https://www.estatesales.net/MI/Flint/48507/1005');
  });

  it('reports zero rows for a page without sale rows', () => {
    expect(parseSalesPage('<html><body><p>No sales</p></body></html>', PAGE_URL)).toEqual({ listings: [], rows: 0, skipped: 0 });
  });
});

describe('nextSalesPageUrl', () => {
  it('follows rel=next', () => {
    expect(nextSalesPageUrl(html, PAGE_URL)).toBe('https://www.estatesales.net/MI/Grand-Blanc/48439?page=2');
  });

  it('returns null on the last page', () => {
    expect(nextSalesPageUrl('<html><body></body></html>', PAGE_URL)).toBeNull();
  });
});

describe('EstateSalesAdapter', () => {
  it('builds the start URL from the configured base', () => {
    const adapter = new EstateSalesAdapter('https://www.estatesales.net');
    expect(adapter.getMeta().name).toBe('estatesales');
    expect(
      adapter.startUrl({ input: 'Flint, MI', city: 'Flint', state: 'MI', zip: null, radiusMiles: 25, limit: 15, label: 'Flint, MI' }),
    ).toBe('https://www.estatesales.net/MI/Flint');
  });
});
