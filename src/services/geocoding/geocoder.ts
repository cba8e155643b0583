import { errorMessage } from '../../errors';
import type { Coordinates, Listing } from '../../types';
import { createLogger, sleep as realSleep, type Logger } from '../../utils/logger';
import { GeocodeCache, normalizeAddressKey } from './cache';
import type { GeocodeLookup } from './nominatim';

export type GeocodeResult =
  | { status: 'found'; coordinates: Coordinates; cached: boolean }
  | { status: 'not_found'; reason: 'empty_address' | 'no_match' | 'lookup_failed' };

export interface GeocoderOptions {
  cache: GeocodeCache;
  lookup: GeocodeLookup;
  /** Pause before every network lookup (Nominatim allows 1 request/second). */
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
}

export class Geocoder {
  private readonly cache: GeocodeCache;
  private readonly lookup: GeocodeLookup;
  private readonly delayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;
  private lookups = 0;

  constructor(opts: GeocoderOptions) {
    this.cache = opts.cache;
    this.lookup = opts.lookup;
    this.delayMs = opts.delayMs;
    this.sleep = opts.sleep ?? realSleep;
    this.log = opts.log ?? createLogger('geocode');
  }

  /** Network lookups issued so far. */
  get lookupCount(): number {
    return this.lookups;
  }

  /** Never throws: failures come back as not_found and are not cached. */
  async geocode(address: string): Promise<GeocodeResult> {
    const key = normalizeAddressKey(address);
    if (!key) return { status: 'not_found', reason: 'empty_address' };

    const hit = this.cache.get(key);
    if (hit) return { status: 'found', coordinates: hit, cached: true };

    if (this.delayMs > 0) await this.sleep(this.delayMs);
    this.lookups++;
    this.log.info('Geocoding:', address.trim());
    try {
      const coordinates = await this.lookup.lookup(address.replace(/\s+/g, ' ').trim());
      if (!coordinates) {
        this.log.warn('No match for', address.trim());
        return { status: 'not_found', reason: 'no_match' };
      }
      this.cache.set(key, coordinates);
      return { status: 'found', coordinates, cached: false };
    } catch (err) {
      this.log.warn(`Geocoding failed for "${address.trim()}":`, errorMessage(err));
      return { status: 'not_found', reason: 'lookup_failed' };
    }
  }
}

/** Geocode listings one at a time; returns new listing objects and how many got coordinates. */
export async function geocodeListings(listings: Listing[], geocoder: Geocoder): Promise<{ listings: Listing[]; geocoded: number }> {
  const out: Listing[] = [];
  let geocoded = 0;
  for (const listing of listings) {
    const result = await geocoder.geocode(listing.address);
    if (result.status === 'found') {
      geocoded++;
      out.push({ ...listing, coordinates: { ...result.coordinates } });
    } else {
      out.push({ ...listing, coordinates: null });
    }
  }
  return { listings: out, geocoded };
}
