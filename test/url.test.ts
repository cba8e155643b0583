import { describe, expect, it } from 'vitest';
import { absoluteUrl, listingKey } from '../src/services/scraping/url';

describe('absoluteUrl', () => {
  it('resolves relative links against the page', () => {
    expect(absoluteUrl('/MI/Flint/48507/1', 'https://www.estatesales.net/MI/Flint')).toBe('https://www.estatesales.net/MI/Flint/48507/1');
  });

  it.each([undefined, null, '', '  ', '#', 'javascript:void(0)'])('returns null for %j', (href) => {
    expect(absoluteUrl(href, 'https://www.estatesales.net/')).toBeNull();
  });
});

describe('listingKey', () => {
  it('ignores scheme, www, host case, trailing slash and fragment', () => {
    const key = 'estatesales.net/MI/Flint/48507/1';
    expect(listingKey('https://www.EstateSales.net/MI/Flint/48507/1/')).toBe(key);
    expect(listingKey('http://estatesales.net/MI/Flint/48507/1#photos')).toBe(key);
  });

  it('drops tracking parameters and sorts the rest', () => {
    expect(listingKey('https://example.com/sale?b=2&utm_source=x&a=1&fbclid=z&mc_eid=q&ref=mail')).toBe('example.com/sale?a=1&b=2');
  });

  it('keeps path case, explicit ports and encoded values', () => {
    expect(listingKey('https://example.com//MI//Flint')).toBe('example.com/MI/Flint');
    expect(listingKey('https://example.com:8080/')).toBe('example.com:8080/');
    expect(listingKey('https://example.com/search?q=oak table')).toBe('example.com/search?q=oak%20table');
  });

  it('uses unparseable text as is', () => {
    expect(listingKey(' not a url ')).toBe('not a url');
  });
});
