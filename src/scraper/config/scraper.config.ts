import { ConfigurationError } from '../errors/scraper.errors';

export const SCRAPER_CONFIG = 'SCRAPER_CONFIG';

export interface ScraperConfig {
  api: {
    baseUrl: string;
    clientId: string;
    clientSecret: string;
  };
  scraping: {
    intervalSeconds: number;
    requestTimeout: number; // ms, 0 disables
    runOnStartup: boolean;
    userAgent: string;
  };
}

const DEFAULT_INTERVAL_SECONDS = 3600; // hourly
const DEFAULT_REQUEST_TIMEOUT = 10000; // 10 seconds
// setTimeout clamps longer delays to 1 ms
const MAX_TIMER_DELAY = 2 ** 31 - 1;
export const MAX_INTERVAL_SECONDS = Math.floor(MAX_TIMER_DELAY / 1000);
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(name);
  }
  return value;
}

function numberOr(value: string | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= min && parsed <= max ? parsed : fallback;
}

/**
 * Build the scraper configuration from environment variables.
 * Only presence of the API settings is checked; numeric settings out of range fall back to their defaults.
 */
export function loadScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  return {
    api: {
      baseUrl: required(env, 'BASE_API_URL').replace(/\/+$/, ''),
      clientId: required(env, 'CLIENT_ID'),
      clientSecret: required(env, 'CLIENT_SECRET'),
    },
    scraping: {
      intervalSeconds: numberOr(
        env.SCRAPE_INTERVAL_SECONDS,
        DEFAULT_INTERVAL_SECONDS,
        1,
        MAX_INTERVAL_SECONDS,
      ),
      requestTimeout: numberOr(env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT, 0, MAX_TIMER_DELAY),
      runOnStartup: env.SCRAPE_ON_STARTUP?.trim().toLowerCase() !== 'false',
      userAgent: DEFAULT_USER_AGENT,
    },
  };
}
