import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';

// Empty assignments in .env (`OPENAI_API_KEY=`) mean "not set".
const blankAsUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());
const intWithDefault = (fallback: number, min = 0) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).default(fallback));
const flag = (fallback: boolean) =>
  z.preprocess(
    (v) => {
      const s = blankAsUndefined(v);
      if (s === undefined) return undefined;
      return String(s) === '1' || /^true$/i.test(String(s));
    },
    z.boolean().default(fallback),
  );

const envSchema = z
  .object({
    ESTATE_SALES_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().default('https://www.estatesales.net')),
    RSS_FEED_URL: optionalString,
    SEARCH_RADIUS_MILES: intWithDefault(25, 1),
    RESULT_LIMIT: intWithDefault(15, 1),
    MAX_PAGES: intWithDefault(3, 1),
    REQUEST_TIMEOUT_MS: intWithDefault(15000, 1000),
    DELAY_MIN_MS: intWithDefault(1000),
    DELAY_MAX_MS: intWithDefault(3000),
    DEBUG_DIR: z.preprocess(blankAsUndefined, z.string().default('.')),

    GEOCODE_CACHE_FILE: z.preprocess(blankAsUndefined, z.string().default('data/geocode_cache.json')),
    GEOCODE_DELAY_MS: intWithDefault(1100),
    GEOCODE_TIMEOUT_MS: intWithDefault(10000, 1000),
    NOMINATIM_URL: z.preprocess(
      blankAsUndefined,
      z.string().url().default('https://nominatim.openstreetmap.org/search'),
    ),
    GEOCODE_USER_AGENT: z.preprocess(
      blankAsUndefined,
      z.string().default('EstateSaleScout/0.1 (contact: you@example.com)'),
    ),

    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.preprocess(blankAsUndefined, z.string().default('gpt-4o-mini')),
    SCORING_TIMEOUT_MS: intWithDefault(30000, 1000),

    SMTP_HOST: z.preprocess(blankAsUndefined, z.string().default('smtp.gmail.com')),
    SMTP_PORT: intWithDefault(465, 1),
    SMTP_SECURE: flag(true),
    SMTP_USER: optionalString,
    SMTP_PASS: optionalString,
    ALERT_FROM_EMAIL: optionalString,
    ALERT_TO_EMAIL: optionalString,
    ALERT_MIN_SCORE: intWithDefault(4, 1),

    SUPABASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    SUPABASE_TABLE: z.preprocess(blankAsUndefined, z.string().default('estate_sales')),
  })
  .refine((env) => env.DELAY_MIN_MS <= env.DELAY_MAX_MS, {
    message: 'DELAY_MIN_MS must not exceed DELAY_MAX_MS',
    path: ['DELAY_MIN_MS'],
  });

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  baseUrl: string;
  rssFeedUrl: string | null;
  radiusMiles: number;
  resultLimit: number;
  maxPages: number;
  requestTimeoutMs: number;
  delay: { minMs: number; maxMs: number };
  debugDir: string;
  geocode: {
    cacheFile: string;
    delayMs: number;
    timeoutMs: number;
    endpoint: string;
    userAgent: string;
  };
  scoring: { apiKey: string | null; model: string; timeoutMs: number };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user: string | null;
    pass: string | null;
    from: string | null;
    to: string[];
    minScore: number;
  };
  supabase: { url: string | null; serviceKey: string | null; table: string };
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment variables: ${details}`);
  }
  return parsed.data;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = parseEnv(source);
  return {
    baseUrl: env.ESTATE_SALES_BASE_URL.replace(/\/+$/, ''),
    rssFeedUrl: env.RSS_FEED_URL ?? null,
    radiusMiles: env.SEARCH_RADIUS_MILES,
    resultLimit: env.RESULT_LIMIT,
    maxPages: env.MAX_PAGES,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    delay: { minMs: env.DELAY_MIN_MS, maxMs: env.DELAY_MAX_MS },
    debugDir: env.DEBUG_DIR,
    geocode: {
      cacheFile: env.GEOCODE_CACHE_FILE,
      delayMs: env.GEOCODE_DELAY_MS,
      timeoutMs: env.GEOCODE_TIMEOUT_MS,
      endpoint: env.NOMINATIM_URL,
      userAgent: env.GEOCODE_USER_AGENT,
    },
    scoring: { apiKey: env.OPENAI_API_KEY ?? null, model: env.OPENAI_MODEL, timeoutMs: env.SCORING_TIMEOUT_MS },
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      secure: env.SMTP_SECURE,
      user: env.SMTP_USER ?? null,
      pass: env.SMTP_PASS ?? null,
      from: env.ALERT_FROM_EMAIL ?? env.SMTP_USER ?? null,
      to: (env.ALERT_TO_EMAIL ?? '').split(/[,\s]+/).map((s) => s.trim()).filter(Boolean),
      minScore: env.ALERT_MIN_SCORE,
    },
    supabase: {
      url: env.SUPABASE_URL ?? null,
      serviceKey: env.SUPABASE_SERVICE_ROLE_KEY ?? null,
      table: env.SUPABASE_TABLE,
    },
  };
}

export function loadDotenv(): void {
  dotenv.config();
}
