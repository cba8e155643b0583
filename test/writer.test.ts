import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { OutputError } from '../src/errors';
import { renderJson, renderText, toRecord, writeListings } from '../src/services/output/writer';
import type { Listing } from '../src/types';

const sale: Listing = {
  title: 'Mid-Century Home',
  address: '123 Main St, Grand Blanc, MI 48439',
  date_range: ['Fri, Oct 17', 'Sun, Oct 19'],
  description: 'Furniture and tools',
  listed_by: 'Blue Water Estates',
  url: 'https://www.estatesales.net/MI/Grand-Blanc/48439/1001',
  source: 'estatesales',
  coordinates: { latitude: 42.9, longitude: -83.6 },
};

const bare: Listing = {
  title: 'Farmhouse Contents',
  address: '',
  date_range: [],
  description: '',
  listed_by: null,
  url: 'https://www.estatesales.net/MI/Fenton/48430/1003',
  source: 'estatesales',
  coordinates: null,
};

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'writer-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('toRecord', () => {
  it('flattens coordinates in a fixed key order', () => {
    expect(Object.keys(toRecord(sale))).toEqual([
      'title', 'address', 'date_range', 'description', 'listed_by', 'url', 'source', 'latitude', 'longitude',
    ]);
    expect(toRecord(bare)).toMatchObject({ latitude: null, longitude: null });
  });

  it('adds score fields only for scored listings', () => {
    const scored = { ...sale, score: { score: 4, summary: 'Good tools', highlights: ['lathe'], categories: ['tools'] } };
    expect(toRecord(scored)).toMatchObject({ score: 4, score_summary: 'Good tools', score_highlights: ['lathe'] });
    expect('score' in toRecord(sale)).toBe(false);
  });
});

describe('renderText', () => {
  it('renders one block per listing separated by a rule', () => {
    expect(renderText([sale, bare])).toBe(
      [
        '#1 - Mid-Century Home',
        'Address: 123 Main St, Grand Blanc, MI 48439',
        'Date: Fri, Oct 17 | Sun, Oct 19',
        'Description: Furniture and tools',
        'Listed by: Blue Water Estates',
        'Link: https://www.estatesales.net/MI/Grand-Blanc/48439/1001',
        'Coordinates: 42.9, -83.6',
        '-'.repeat(80),
        '#2 - Farmhouse Contents',
        'Address: not specified',
        'Date: not specified',
        'Description: none',
        'Link: https://www.estatesales.net/MI/Fenton/48430/1003',
        'Coordinates: not found',
        '',
      ].join('\n'),
    );
  });

  it('says so when there are no listings', () => {
    expect(renderText([])).toBe('No sale listings found.\n');
  });
});

describe('writeListings', () => {
  it('writes the same bytes on every run', async () => {
    const paths = { jsonPath: path.join(dir, 'out', 'sales.json'), txtPath: path.join(dir, 'out', 'sales.txt') };

    await writeListings([sale, bare], paths);
    const firstJson = await fs.readFile(paths.jsonPath, 'utf8');
    const firstTxt = await fs.readFile(paths.txtPath, 'utf8');
    await writeListings([sale, bare], paths);

    expect(await fs.readFile(paths.jsonPath, 'utf8')).toBe(firstJson);
    expect(await fs.readFile(paths.txtPath, 'utf8')).toBe(firstTxt);
    expect(firstJson).toBe(renderJson([sale, bare]));
    expect(JSON.parse(firstJson)).toHaveLength(2);
    expect((await fs.readdir(path.join(dir, 'out'))).sort()).toEqual(['sales.json', 'sales.txt']);
  });

  it('writes an empty array for no listings', async () => {
    const paths = { jsonPath: path.join(dir, 'sales.json'), txtPath: path.join(dir, 'sales.txt') };
    await writeListings([], paths);
    expect(await fs.readFile(paths.jsonPath, 'utf8')).toBe('[]\n');
  });

  it('raises an OutputError naming the path and leaves no temp file', async () => {
    const blocked = path.join(dir, 'sales.json');
    await fs.mkdir(path.join(blocked, 'occupied'), { recursive: true });

    const err = await writeListings([sale], { jsonPath: blocked, txtPath: path.join(dir, 'sales.txt') }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OutputError);
    expect(err).toMatchObject({ path: blocked, exitCode: 3 });
    expect(await fs.readdir(dir)).toEqual(['sales.json']);
  });
});
