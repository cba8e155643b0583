import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../errors';
import type { Listing } from '../../types';

export interface SummaryTemplate {
  subject: string;
  text: string;
  html: string;
}

export const DEFAULT_TEMPLATE: SummaryTemplate = {
  subject: 'Estate sales near {{location}}: {{count}} worth a look',
  text: 'Top estate sales near {{location}} ({{count}}):\n\n{{listings}}\n',
  html: '<p>Top estate sales near <strong>{{location}}</strong> ({{count}}):</p>\n{{listings}}',
};

const templateSchema = z.object({
  subject: z.string().min(1),
  text: z.string().min(1),
  html: z.string().default(''),
});

export async function loadTemplate(file: string): Promise<SummaryTemplate> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Could not read email template ${file}: ${errorMessage(err)}`);
  }
  const parsed = templateSchema.safeParse(data);
  if (!parsed.success) throw new ConfigError(`Email template ${file} needs "subject" and "text" strings`);
  return parsed.data;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Replace {{name}} placeholders; unknown names render as empty strings. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{\s*([a-zA-Z_]+)\s*\}\}/g, (_m, name: string) => vars[name] ?? '');
}

function scoreTag(l: Listing): string {
  return l.score ? ` [${l.score.score}/5]` : '';
}

export function listingsAsText(listings: Listing[]): string {
  return listings
    .map((l, i) => {
      const when = l.date_range.length ? ` (${l.date_range.join(' | ')})` : '';
      return `${i + 1}. ${l.title}${scoreTag(l)}${when}\n   ${l.address || 'address not listed'}\n   ${l.url}`;
    })
    .join('\n');
}

export function listingsAsHtml(listings: Listing[]): string {
  const items = listings.map((l) => {
    const when = l.date_range.length ? ` <em>${escapeHtml(l.date_range.join(' | '))}</em>` : '';
    return `<li><a href="${escapeHtml(l.url)}">${escapeHtml(l.title)}</a>${escapeHtml(scoreTag(l))}${when}<br>${escapeHtml(l.address || 'address not listed')}</li>`;
  });
  return `<ol>\n${items.join('\n')}\n</ol>`;
}
