import { loadConfig, loadDotenv, type AppConfig } from './config';
import { ConfigError, ScoutError, errorMessage } from './errors';
import { createSmtpTransport, EmailNotifier } from './services/alerts/notify';
import { DEFAULT_TEMPLATE, loadTemplate } from './services/alerts/template';
import { GeocodeCache } from './services/geocoding/cache';
import { Geocoder } from './services/geocoding/geocoder';
import { NominatimLookup } from './services/geocoding/nominatim';
import { OpenAiScorer } from './services/scoring/openaiScorer';
import { ScrapeEngine, type EngineOptions } from './services/scraping/engine';
import { PageFetcher } from './services/scraping/fetcher';
import { randomPolicy } from './services/scraping/http';
import { EstateSalesAdapter } from './services/scraping/sites/estateSales';
import { RssFeedAdapter } from './services/scraping/sites/rssFeed';
import { SupabaseSink, supabaseUpsert } from './services/sync/supabaseSink';
import type { RunSummary } from './types';
import { getArg, getFlag, getIntArg, positionalText } from './utils/args';
import { createLogger, type Logger } from './utils/logger';
import { getAdminClient } from './utils/supabase';

const log = createLogger('scout');

const USAGE = `Usage: npm run scout -- <location> [options]

  <location>            "Grand Blanc, MI 48439", "New York NY" or "90210"

Options:
  --limit N             keep at most N listings (default RESULT_LIMIT)
  --max-pages N         fetch at most N result pages (default MAX_PAGES)
  --json PATH           JSON output (default scraped_sales.json)
  --txt PATH            text output (default scraped_sales.txt)
  --debug               save raw pages to DEBUG_DIR
  --no-geocode          skip geocoding
  --rss URL             read an RSS/Atom feed ({city} {state} {zip} are filled in)
  --score               rate listings with OpenAI (needs OPENAI_API_KEY)
  --sync                upsert listings into Supabase
  --notify              email a summary (needs SMTP_* and ALERT_TO_EMAIL)
  --template FILE       JSON email template with subject/text/html
  --help                show this message`;

export type OptionalSteps = Pick<EngineOptions, 'scorer' | 'sink' | 'notifier'>;

/**
 * Scorer, sink and notifier asked for on the command line. One that cannot be
 * set up from the current configuration is skipped with a warning, so the
 * scrape and the output files still happen.
 */
export async function optionalSteps(config: AppConfig, argv: string[], logger: Logger = log): Promise<OptionalSteps> {
  const steps: OptionalSteps = {};

  if (getFlag(argv, 'score')) {
    if (!config.scoring.apiKey) {
      logger.warn('Skipping --score: OPENAI_API_KEY is not set');
    } else {
      steps.scorer = new OpenAiScorer({
        apiKey: config.scoring.apiKey,
        model: config.scoring.model,
        timeoutMs: config.scoring.timeoutMs,
      });
    }
  }

  if (getFlag(argv, 'sync')) {
    try {
      const client = getAdminClient(config.supabase);
      steps.sink = new SupabaseSink(supabaseUpsert(client, config.supabase.table));
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      logger.warn(`Skipping --sync: ${err.message}`);
    }
  }

  if (getFlag(argv, 'notify')) {
    try {
      const templateFile = getArg(argv, 'template');
      const template = templateFile ? await loadTemplate(templateFile) : DEFAULT_TEMPLATE;
      const transport = createSmtpTransport(config.smtp);
      const from = config.smtp.from ?? config.smtp.user ?? '';
      steps.notifier = new EmailNotifier(transport, { from, to: config.smtp.to }, template);
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      logger.warn(`Skipping --notify: ${err.message}`);
    }
  }

  return steps;
}

export async function buildEngine(config: AppConfig, argv: string[]): Promise<ScrapeEngine> {
  const maxPages = getIntArg(argv, 'max-pages') ?? config.maxPages;
  const debug = getFlag(argv, 'debug');
  const feedUrl = getArg(argv, 'rss') ?? config.rssFeedUrl;
  const adapter = feedUrl ? new RssFeedAdapter(feedUrl) : new EstateSalesAdapter(config.baseUrl);
  const policy = randomPolicy(config.delay);

  const opts: EngineOptions = {
    adapter,
    createFetcher: (query) =>
      new PageFetcher({
        policy,
        timeoutMs: config.requestTimeoutMs,
        maxPages,
        debugDir: debug ? config.debugDir : null,
        debugLabel: query.label,
      }),
    defaults: { radiusMiles: config.radiusMiles, limit: config.resultLimit },
    output: {
      jsonPath: getArg(argv, 'json') ?? 'scraped_sales.json',
      txtPath: getArg(argv, 'txt') ?? 'scraped_sales.txt',
    },
    minAlertScore: config.smtp.minScore,
  };

  if (!getFlag(argv, 'no-geocode')) {
    const cache = await GeocodeCache.load(config.geocode.cacheFile);
    const lookup = new NominatimLookup({
      endpoint: config.geocode.endpoint,
      userAgent: config.geocode.userAgent,
      timeoutMs: config.geocode.timeoutMs,
    });
    opts.geocoding = { cache, geocoder: new Geocoder({ cache, lookup, delayMs: config.geocode.delayMs }) };
  }

  const steps = await optionalSteps(config, argv);
  return new ScrapeEngine({ ...opts, ...steps });
}

export function printSummary(summary: RunSummary): void {
  console.log('\nSummary:');
  console.log(' location =', summary.query.label);
  console.log(' pages    =', summary.pages);
  console.log(' listings =', summary.found, summary.duplicates ? `(${summary.duplicates} duplicates dropped)` : '');
  if (summary.skippedRows) console.log(' skipped  =', summary.skippedRows, 'rows without title or link');
  console.log(' geocoded =', summary.geocoded);
  if (summary.scored) console.log(' scored   =', summary.scored);
  console.log(' json     =', summary.outputs.json);
  console.log(' txt      =', summary.outputs.txt);
  for (const e of summary.errors) console.warn(' error    =', e);
}

export async function main(argv: string[]): Promise<number> {
  if (getFlag(argv, 'help', '-h')) {
    console.log(USAGE);
    return 0;
  }
  const location = positionalText(argv);
  if (!location) {
    console.error(USAGE);
    return 2;
  }

  loadDotenv();
  try {
    const config = loadConfig();
    const engine = await buildEngine(config, argv);
    const summary = await engine.run(location, { limit: getIntArg(argv, 'limit') });
    printSummary(summary);
    return 0;
  } catch (err) {
    if (err instanceof ScoutError) {
      log.error(`${err.code}:`, err.message);
      return err.exitCode;
    }
    log.error('Unexpected error:', errorMessage(err));
    return 1;
  }
}
