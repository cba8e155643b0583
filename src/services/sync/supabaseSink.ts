import type { SupabaseClient } from '@supabase/supabase-js';
import type { Listing, ListingRecord } from '../../types';
import { toRecord } from '../output/writer';

/** Receives the final listing list, e.g. the table behind a spreadsheet-style front end. */
export interface ListingSink {
  push(listings: Listing[]): Promise<void>;
}

export type UpsertRows = (rows: Array<ListingRecord & { scraped_at: string }>) => Promise<void>;

export function supabaseUpsert(client: SupabaseClient, table: string): UpsertRows {
  return async (rows) => {
    const { error } = await client.from(table).upsert(rows, { onConflict: 'url', ignoreDuplicates: false });
    if (error) throw new Error(`Upsert into ${table} failed: ${error.message}`);
  };
}

export class SupabaseSink implements ListingSink {
  constructor(private readonly upsert: UpsertRows, private readonly now: () => Date = () => new Date()) {}

  async push(listings: Listing[]): Promise<void> {
    if (!listings.length) return;
    const scraped_at = this.now().toISOString();
    await this.upsert(listings.map((l) => ({ ...toRecord(l), scraped_at })));
  }
}
