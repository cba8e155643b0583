import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GeocodeCache, normalizeAddressKey } from '../src/services/geocoding/cache';
import { silentLogger } from '../src/utils/logger';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'geocode-cache-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('normalizeAddressKey', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(normalizeAddressKey('  123  Main St,\n Flint ')).toBe('123 main st, flint');
  });
});

describe('GeocodeCache', () => {
  it('starts empty when the file does not exist', async () => {
    const cache = await GeocodeCache.load(path.join(dir, 'missing.json'), silentLogger);
    expect(cache.size).toBe(0);
    expect(await cache.save()).toBe(false);
  });

  it('starts empty when the file is not valid JSON', async () => {
    const file = path.join(dir, 'cache.json');
    await fs.writeFile(file, '{ not json', 'utf8');
    const cache = await GeocodeCache.load(file, silentLogger);
    expect(cache.size).toBe(0);
  });

  it('keeps coordinate pairs and drops unusable entries', async () => {
    const file = path.join(dir, 'cache.json');
    await fs.writeFile(
      file,
      JSON.stringify({ 'A St': [1.5, 2.5], 'B St': null, 'C St': ['1', '2'], 'D St': [3, 4, 5] }),
      'utf8',
    );
    const cache = await GeocodeCache.load(file, silentLogger);
    expect(cache.size).toBe(1);
    expect(cache.get('a st')).toEqual({ latitude: 1.5, longitude: 2.5 });
    expect(cache.has('B St')).toBe(false);
  });

  it('keeps the first value written for a key', () => {
    const cache = new GeocodeCache(null, silentLogger);
    cache.set('A St', { latitude: 1, longitude: 2 });
    cache.set('a st', { latitude: 9, longitude: 9 });
    expect(cache.get('A ST')).toEqual({ latitude: 1, longitude: 2 });
  });

  it('saves sorted keys and reloads them, leaving no temp file', async () => {
    const file = path.join(dir, 'nested', 'cache.json');
    const cache = new GeocodeCache(file, silentLogger);
    cache.set('B St', { latitude: 3, longitude: 4 });
    cache.set('A St', { latitude: 1, longitude: 2 });

    expect(await cache.save()).toBe(true);
    expect(cache.isDirty).toBe(false);
    expect(await cache.save()).toBe(false);

    expect(await fs.readFile(file, 'utf8')).toBe('{\n  "a st": [\n    1,\n    2\n  ],\n  "b st": [\n    3,\n    4\n  ]\n}\n');
    expect(await fs.readdir(path.dirname(file))).toEqual(['cache.json']);

    const reloaded = await GeocodeCache.load(file, silentLogger);
    expect(reloaded.toJSON()).toEqual({ 'a st': [1, 2], 'b st': [3, 4] });
  });
});
