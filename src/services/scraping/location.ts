import { readFileSync } from 'fs';
import { InputError } from '../../errors';
import type { SearchQuery } from '../../types';

const ZIP_RE = /^\d{5}(?:-\d{4})?$/;
const CODE_RE = /^[A-Za-z]{2}$/;
const CITY_RE = /^\p{L}[\p{L} .'-]*$/u;

// lower-case state name -> USPS code
const STATE_NAMES = loadStateNames();
const STATE_CODES = new Set(STATE_NAMES.values());

function loadStateNames(): Map<string, string> {
  const raw: unknown = JSON.parse(readFileSync(new URL('./usStates.json', import.meta.url), 'utf8'));
  const names = new Map<string, string>();
  if (raw && typeof raw === 'object') {
    for (const [name, code] of Object.entries(raw)) {
      if (typeof code === 'string') names.set(name, code);
    }
  }
  return names;
}

export interface LocationDefaults {
  radiusMiles: number;
  limit: number;
}

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

function titleCase(s: string): string {
  return s.replace(/(^|[\s-])(\p{L})/gu, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}

function labelFor(city: string | null, state: string | null, zip: string | null): string {
  const head = [city, state].filter(Boolean).join(', ');
  return [head, zip].filter(Boolean).join(' ');
}

function stateCode(words: string[]): string | null {
  if (words.length === 1 && CODE_RE.test(words[0]) && STATE_CODES.has(words[0].toUpperCase())) {
    return words[0].toUpperCase();
  }
  return STATE_NAMES.get(words.join(' ').toLowerCase()) ?? null;
}

/**
 * Remove a trailing state from tokens and return its code. A code ("MI") may
 * be the only token; a name ("Michigan", "New York") must leave a city behind.
 */
function popTrailingState(tokens: string[]): string | null {
  const last = tokens[tokens.length - 1];
  if (last && CODE_RE.test(last)) {
    const code = stateCode([last]);
    if (code) {
      tokens.pop();
      return code;
    }
  }
  for (const n of [2, 1]) {
    if (tokens.length <= n) continue;
    const code = STATE_NAMES.get(tokens.slice(-n).join(' ').toLowerCase());
    if (code) {
      tokens.splice(-n, n);
      return code;
    }
  }
  return null;
}

/** First state named anywhere in words: the whole run, then pairs, then single words. */
function findState(words: string[]): string | null {
  for (const n of [words.length, 2, 1]) {
    for (let i = 0; i + n <= words.length; i++) {
      const code = stateCode(words.slice(i, i + n));
      if (code) return code;
    }
  }
  return null;
}

/**
 * Turn "Grand Blanc, MI 48439", "New York NY" or "90210" into search fields.
 * Pattern based only: a 5-digit token is a ZIP, a trailing state code or name
 * is the state, whatever precedes them is the city. Words that fit none of
 * these are ignored; only input with no city, state or ZIP at all is rejected.
 */
export function resolveLocation(input: string, defaults: LocationDefaults): SearchQuery {
  const text = collapse(String(input ?? ''));
  if (!text) throw new InputError('Location is empty. Try "Grand Blanc, MI 48439", "New York NY" or "90210".');

  let state: string | null = null;
  let zip: string | null = null;

  const commaAt = text.indexOf(',');
  const head = collapse(commaAt >= 0 ? text.slice(0, commaAt) : text);
  const tokens = head ? head.split(' ') : [];
  if (tokens.length && ZIP_RE.test(tokens[tokens.length - 1])) zip = tokens.pop() ?? null;
  state = popTrailingState(tokens);

  if (commaAt >= 0) {
    const rest = text.slice(commaAt + 1).split(/[\s,]+/).filter(Boolean);
    const words: string[] = [];
    for (const token of rest) {
      if (ZIP_RE.test(token)) zip = zip ?? token;
      else words.push(token);
    }
    if (!state && words.length) state = findState(words);
  }

  const cityText = tokens.join(' ');
  const city = cityText && CITY_RE.test(cityText) ? titleCase(cityText) : null;
  if (!city && !state && !zip) {
    throw new InputError(`Could not read a city, state or ZIP from "${text}".`);
  }

  return {
    input: text,
    city,
    state,
    zip,
    radiusMiles: defaults.radiusMiles,
    limit: defaults.limit,
    label: labelFor(city, state, zip),
  };
}

export function citySlug(city: string): string {
  return city
    .replace(/[.']/g, '')
    .trim()
    .split(/[\s-]+/)
    .filter(Boolean)
    .join('-');
}

/** EstateSales.net search URL for a resolved query. */
export function buildSearchUrl(baseUrl: string, query: SearchQuery): string {
  const base = baseUrl.replace(/\/+$/, '');
  const { city, state, zip } = query;
  if (state && city) {
    const path = [state, citySlug(city), zip].filter(Boolean).map((p) => encodeURIComponent(String(p))).join('/');
    return `${base}/${path}`;
  }
  if (state && !zip) return `${base}/${encodeURIComponent(state)}`;

  const u = new URL('/search', base);
  if (zip) u.searchParams.set('zip', zip);
  else if (city) u.searchParams.set('city', city);
  if (state) u.searchParams.set('state', state);
  u.searchParams.set('radius', String(query.radiusMiles));
  return u.toString();
}

/** Fill {city}/{state}/{zip} placeholders of a feed URL template. */
export function fillFeedUrl(template: string, query: SearchQuery): string {
  return template.replace(/\{(city|state|zip)\}/g, (_m, key: 'city' | 'state' | 'zip') => {
    const value = query[key];
    if (!value) return '';
    return encodeURIComponent(key === 'city' ? citySlug(value) : value);
  });
}
