import { describe, expect, it } from 'vitest';
import { loadConfig, parseEnv } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.baseUrl).toBe('https://www.estatesales.net');
    expect(config.rssFeedUrl).toBeNull();
    expect(config.radiusMiles).toBe(25);
    expect(config.resultLimit).toBe(15);
    expect(config.maxPages).toBe(3);
    expect(config.delay).toEqual({ minMs: 1000, maxMs: 3000 });
    expect(config.geocode.cacheFile).toBe('data/geocode_cache.json');
    expect(config.geocode.delayMs).toBe(1100);
    expect(config.scoring).toEqual({ apiKey: null, model: 'gpt-4o-mini', timeoutMs: 30000 });
    expect(config.smtp).toMatchObject({ host: 'smtp.gmail.com', port: 465, secure: true, from: null, to: [], minScore: 4 });
    expect(config.supabase).toEqual({ url: null, serviceKey: null, table: 'estate_sales' });
  });

  it('treats blank values as unset and parses the rest', () => {
    const config = loadConfig({
      ESTATE_SALES_BASE_URL: 'https://sales.example.com/',
      RESULT_LIMIT: '5',
      OPENAI_API_KEY: '',
      SMTP_SECURE: '0',
      SMTP_USER: 'bot@example.com',
      ALERT_TO_EMAIL: 'a@example.com, b@example.com',
    });
    expect(config.baseUrl).toBe('https://sales.example.com');
    expect(config.resultLimit).toBe(5);
    expect(config.scoring.apiKey).toBeNull();
    expect(config.smtp.secure).toBe(false);
    expect(config.smtp.from).toBe('bot@example.com');
    expect(config.smtp.to).toEqual(['a@example.com', 'b@example.com']);
  });

  it.each([
    [{ RESULT_LIMIT: 'lots' }],
    [{ MAX_PAGES: '0' }],
    [{ DELAY_MIN_MS: '5000', DELAY_MAX_MS: '1000' }],
    [{ SUPABASE_URL: 'not a url' }],
  ])('rejects %j', (env) => {
    expect(() => parseEnv(env)).toThrow(ConfigError);
  });
});
