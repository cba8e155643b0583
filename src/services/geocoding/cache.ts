import { promises as fs } from 'fs';
import * as path from 'path';
import { errorMessage } from '../../errors';
import type { Coordinates } from '../../types';
import { createLogger, type Logger } from '../../utils/logger';

/** Cache key for an address: trimmed, whitespace collapsed, lower-cased. */
export function normalizeAddressKey(address: string): string {
  return String(address ?? '').replace(/\s+/g, ' ').trim().toLowerCase();
}

function isCoordinate(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

/**
 * Address -> coordinate map persisted as JSON ({ "key": [lat, lon] }).
 * Only grows; one instance per run, passed to the Geocoder explicitly.
 */
export class GeocodeCache {
  private readonly entries = new Map<string, Coordinates>();
  private dirty = false;

  constructor(private readonly file: string | null = null, private readonly log: Logger = createLogger('geocode-cache')) {}

  /** Read the cache file. A missing file starts empty; an unreadable one is logged and ignored. */
  static async load(file: string, log: Logger = createLogger('geocode-cache')): Promise<GeocodeCache> {
    const cache = new GeocodeCache(file, log);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code !== 'ENOENT') {
        log.warn(`Could not read ${file}, starting empty:`, errorMessage(err));
      }
      return cache;
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      log.warn(`${file} is not valid JSON, starting empty:`, errorMessage(err));
      return cache;
    }
    if (!data || typeof data !== 'object' || Array.isArray(data)) {
      log.warn(`${file} is not a JSON object, starting empty`);
      return cache;
    }
    let ignored = 0;
    for (const [key, value] of Object.entries(data)) {
      if (Array.isArray(value) && value.length === 2 && isCoordinate(value[0]) && isCoordinate(value[1])) {
        cache.entries.set(normalizeAddressKey(key), { latitude: value[0], longitude: value[1] });
      } else {
        ignored++;
      }
    }
    log.info(`Loaded ${cache.entries.size} cached addresses from ${file}${ignored ? ` (${ignored} unusable entries ignored)` : ''}`);
    return cache;
  }

  get size(): number {
    return this.entries.size;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get(address: string): Coordinates | undefined {
    return this.entries.get(normalizeAddressKey(address));
  }

  has(address: string): boolean {
    return this.entries.has(normalizeAddressKey(address));
  }

  /** First write wins; later writes for the same key are ignored. */
  set(address: string, coordinates: Coordinates): void {
    const key = normalizeAddressKey(address);
    if (!key || this.entries.has(key)) return;
    this.entries.set(key, { latitude: coordinates.latitude, longitude: coordinates.longitude });
    this.dirty = true;
  }

  toJSON(): Record<string, [number, number]> {
    const out: Record<string, [number, number]> = {};
    for (const key of [...this.entries.keys()].sort()) {
      const c = this.entries.get(key);
      if (c) out[key] = [c.latitude, c.longitude];
    }
    return out;
  }

  /** Write atomically (temp file + rename). No-op when nothing changed or there is no file. */
  async save(): Promise<boolean> {
    if (!this.file || !this.dirty) return false;
    const tmp = `${this.file}.${process.pid}.tmp`;
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    try {
      await fs.writeFile(tmp, JSON.stringify(this.toJSON(), null, 2) + '\n', 'utf8');
      await fs.rename(tmp, this.file);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
    this.dirty = false;
    this.log.info(`Saved ${this.entries.size} addresses to ${this.file}`);
    return true;
  }
}
