import axios from 'axios';
import type { Coordinates } from '../../types';

/** One external lookup: an address in, coordinates or null out. May throw on network errors. */
export interface GeocodeLookup {
  lookup(address: string): Promise<Coordinates | null>;
}

export interface NominatimOptions {
  endpoint: string;
  userAgent: string;
  timeoutMs: number;
}

type NominatimHit = { lat?: unknown; lon?: unknown };

/** OpenStreetMap Nominatim search (https://nominatim.org/release-docs/latest/api/Search/). */
export class NominatimLookup implements GeocodeLookup {
  constructor(private readonly opts: NominatimOptions) {}

  async lookup(address: string): Promise<Coordinates | null> {
    const resp = await axios.get<unknown>(this.opts.endpoint, {
      params: { q: address, format: 'json', limit: 1 },
      headers: { 'User-Agent': this.opts.userAgent, Accept: 'application/json' },
      timeout: this.opts.timeoutMs,
      validateStatus: (s) => !!s && s >= 200 && s < 300,
    });
    return firstHit(resp.data);
  }
}

export function firstHit(data: unknown): Coordinates | null {
  if (!Array.isArray(data) || data.length === 0) return null;
  const hit: NominatimHit = typeof data[0] === 'object' && data[0] !== null ? data[0] : {};
  const latitude = Number(hit.lat);
  const longitude = Number(hit.lon);
  if (hit.lat == null || hit.lon == null || !Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
  return { latitude, longitude };
}
