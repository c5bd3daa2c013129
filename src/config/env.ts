import { z } from 'zod';
import type { ExtractionSettings } from '../extractors/types.js';
import type { TrackerSettings } from '../pipelines/tracker.js';
import type { BrowserOptions } from '../services/browser.js';
import { ConfigError } from '../utils/errors.js';
// logger.ts loads .env before anything reads process.env.
import { logger } from '../utils/logger.js';

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off', ''].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
    return z.NEVER;
  });

export const envSchema = z
  .object({
    SUPABASE_URL: z.string().url('SUPABASE_URL must be a valid URL'),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'SUPABASE_SERVICE_ROLE_KEY is required'),
    USER_AGENT: z
      .string()
      .default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'),
    BROWSER_HEADLESS: booleanFlag.default(true),
    BROWSER_STEALTH: booleanFlag.default(false),
    NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    SELECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    LOAD_MORE_MAX_CLICKS: z.coerce.number().int().nonnegative().default(50),
    LOAD_MORE_SETTLE_MS: z.coerce.number().int().nonnegative().default(1500),
    SCRAPE_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(2000),
    SCRAPE_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(5000),
    MAX_JOB_HISTORY: z.coerce.number().int().positive().default(100),
    NOTIFICATION_TYPE: z.enum(['discord', 'none']).default('discord'),
    DISCORD_WEBHOOK_URL: z.string().url('DISCORD_WEBHOOK_URL must be a valid URL').optional(),
  })
  .refine((env) => env.SCRAPE_DELAY_MIN_MS <= env.SCRAPE_DELAY_MAX_MS, {
    message: 'SCRAPE_DELAY_MIN_MS must not exceed SCRAPE_DELAY_MAX_MS',
    path: ['SCRAPE_DELAY_MIN_MS'],
  });

export type EnvConfig = z.infer<typeof envSchema>;

let cachedEnv: EnvConfig | null = null;

/**
 * Parses an environment record. Empty strings count as unset so that a
 * blank line in .env falls back to the default.
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = envSchema.safeParse(cleaned);

  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    logger.error({ errors: fieldErrors }, 'Environment validation failed');
    throw new ConfigError(`Environment validation failed: ${result.error.message}`, { errors: fieldErrors });
  }

  return result.data;
}

export function getEnv(): EnvConfig {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function validateEnv(): boolean {
  try {
    getEnv();
    return true;
  } catch {
    return false;
  }
}

export function extractionSettingsFrom(env: EnvConfig): ExtractionSettings {
  return {
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    selectorTimeoutMs: env.SELECTOR_TIMEOUT_MS,
    loadMoreMaxClicks: env.LOAD_MORE_MAX_CLICKS,
    loadMoreSettleMs: env.LOAD_MORE_SETTLE_MS,
  };
}

export function trackerSettingsFrom(env: EnvConfig): TrackerSettings {
  return {
    extraction: extractionSettingsFrom(env),
    scrapeDelayMinMs: env.SCRAPE_DELAY_MIN_MS,
    scrapeDelayMaxMs: env.SCRAPE_DELAY_MAX_MS,
  };
}

export function browserOptionsFrom(env: EnvConfig): BrowserOptions {
  return {
    headless: env.BROWSER_HEADLESS,
    stealth: env.BROWSER_STEALTH,
    userAgent: env.USER_AGENT,
  };
}
