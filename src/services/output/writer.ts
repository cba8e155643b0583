import { promises as fs } from 'fs';
import * as path from 'path';
import { OutputError } from '../../errors';
import type { Listing, ListingRecord } from '../../types';

export interface OutputPaths {
  jsonPath: string;
  txtPath: string;
}

const RULE = '-'.repeat(80);

/** Flat record with a fixed key order; score keys only appear on scored listings. */
export function toRecord(listing: Listing): ListingRecord {
  const record: ListingRecord = {
    title: listing.title,
    address: listing.address,
    date_range: [...listing.date_range],
    description: listing.description,
    listed_by: listing.listed_by,
    url: listing.url,
    source: listing.source,
    latitude: listing.coordinates ? listing.coordinates.latitude : null,
    longitude: listing.coordinates ? listing.coordinates.longitude : null,
  };
  if (listing.score) {
    record.score = listing.score.score;
    record.score_summary = listing.score.summary;
    record.score_highlights = [...listing.score.highlights];
  }
  return record;
}

export function renderJson(listings: Listing[]): string {
  return JSON.stringify(listings.map(toRecord), null, 2) + '\n';
}

export function renderText(listings: Listing[]): string {
  if (!listings.length) return 'No sale listings found.\n';
  const blocks = listings.map((l, i) => {
    const lines = [
      `#${i + 1} - ${l.title}`,
      `Address: ${l.address || 'not specified'}`,
      `Date: ${l.date_range.length ? l.date_range.join(' | ') : 'not specified'}`,
      `Description: ${l.description || 'none'}`,
    ];
    if (l.listed_by) lines.push(`Listed by: ${l.listed_by}`);
    lines.push(`Link: ${l.url}`);
    lines.push(l.coordinates ? `Coordinates: ${l.coordinates.latitude}, ${l.coordinates.longitude}` : 'Coordinates: not found');
    if (l.score) lines.push(`Score: ${l.score.score}/5 - ${l.score.summary}`);
    return lines.join('\n');
  });
  return blocks.join(`\n${RULE}\n`) + '\n';
}

/**
 * Write content to a sibling temp file, then rename over the target, so a
 * failed run never leaves a partial file under the final name.
 */
export async function writeFileAtomic(file: string, content: string): Promise<void> {
  const tmp = `${file}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
    await fs.writeFile(tmp, content, 'utf8');
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw new OutputError(file, err);
  }
}

export async function writeListings(listings: Listing[], paths: OutputPaths): Promise<OutputPaths> {
  await writeFileAtomic(paths.jsonPath, renderJson(listings));
  await writeFileAtomic(paths.txtPath, renderText(listings));
  return paths;
}
