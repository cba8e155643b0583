import { z } from 'zod';
import { ScoringError, errorMessage } from '../../errors';
import type { Listing, ListingScore } from '../../types';
import { createLogger, type Logger } from '../../utils/logger';

/** Rates one listing. Implementations may throw; callers pass the listing through unscored. */
export interface ListingScorer {
  score(listing: Listing): Promise<ListingScore>;
}

const scoreSchema = z.object({
  score: z.coerce.number().int().min(1).max(5),
  summary: z.string().default(''),
  highlights: z.array(z.string()).default([]),
  categories: z.array(z.string()).default([]),
});

/** Validate the model's JSON reply. Tolerates a ```json fence around the object. */
export function parseScoreResponse(text: string | null | undefined): ListingScore {
  const raw = String(text ?? '').trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  if (!raw) throw new ScoringError('Empty scoring response');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ScoringError(`Scoring response is not JSON: ${errorMessage(err)}`, err);
  }
  const parsed = scoreSchema.safeParse(data);
  if (!parsed.success) {
    throw new ScoringError(`Scoring response has the wrong shape: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

export function buildScoringPrompt(listing: Listing): string {
  return [
    'Rate this estate sale for a buyer hunting antiques, collectibles and resellable vintage items.',
    'Reply with only a JSON object: {"score": 1-5 integer, "summary": one sentence, "highlights": notable items, "categories": item categories}.',
    '',
    `Title: ${listing.title}`,
    `Address: ${listing.address || 'unknown'}`,
    `Dates: ${listing.date_range.join(' | ') || 'unknown'}`,
    `Description: ${listing.description || 'none'}`,
  ].join('\n');
}

export async function scoreListings(
  listings: Listing[],
  scorer: ListingScorer,
  log: Logger = createLogger('score'),
): Promise<{ listings: Listing[]; scored: number; failed: number }> {
  const out: Listing[] = [];
  let scored = 0;
  let failed = 0;
  for (const listing of listings) {
    try {
      const score = await scorer.score(listing);
      out.push({ ...listing, score });
      scored++;
    } catch (err) {
      failed++;
      log.warn(`Leaving "${listing.title}" unscored:`, errorMessage(err));
      out.push(listing);
    }
  }
  return { listings: out, scored, failed };
}
