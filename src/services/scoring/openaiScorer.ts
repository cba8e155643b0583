import OpenAI from 'openai';
import type { Listing, ListingScore } from '../../types';
import { buildScoringPrompt, parseScoreResponse, type ListingScorer } from './scorer';

export interface OpenAiScorerOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class OpenAiScorer implements ListingScorer {
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAiScorerOptions) {
    this.client = new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 1 });
  }

  async score(listing: Listing): Promise<ListingScore> {
    const completion = await this.client.chat.completions.create({
      model: this.opts.model,
      temperature: 0,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: 'You grade estate sale listings. Answer with JSON only.' },
        { role: 'user', content: buildScoringPrompt(listing) },
      ],
    });
    return parseScoreResponse(completion.choices[0]?.message?.content);
  }
}
