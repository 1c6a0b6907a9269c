/**
 * Collateral Loan Quotes - Configuration
 *
 * Environment settings, validated once at startup.
 */

import { z } from 'zod';

const BooleanFlagSchema = z
  .string()
  .transform(value => ['1', 'true', 'yes'].includes(value.trim().toLowerCase()));

const UrlListSchema = z
  .string()
  .transform(value => value.split(',').map(url => url.trim()).filter(url => url.length > 0))
  .pipe(z.array(z.string().url()));

const DEFAULT_NEWS_FEEDS = [
  'https://www.coindesk.com/arc/outboundfeeds/rss/?outputType=xml',
  'https://cointelegraph.com/rss',
].join(',');

export const SettingsSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5002),
  NODE_ENV: z.string().default('development'),

  METRICS_API_BASE: z.string().url().default('http://localhost:5002'),
  METRICS_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  METRICS_RETRIES: z.coerce.number().int().min(0).default(2),
  METRICS_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(60),

  AI_PROVIDER: z.enum(['groq', 'none']).default('groq'),
  AI_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  AI_MODEL_NAME: z.string().min(1).default('llama-3.3-70b-versatile'),
  AI_MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  AI_MODEL_MAX_TOKENS: z.coerce.number().int().positive().default(800),
  GROQ_API_KEY: z.string().default(''),
  USE_LLM_SUMMARY: BooleanFlagSchema.default('false'),

  MARKET_DATA_BASE_URL: z.string().url().default('https://api.coingecko.com/api/v3'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  NEWS_FEED_URLS: UrlListSchema.default(DEFAULT_NEWS_FEEDS),
  NEWS_PER_COIN: z.coerce.number().int().min(0).default(3),

  CONTRACT_ADDRESS: z.string().default(''),
  EXPLORER_BASE_URL: z.string().default(''),
  CHAIN_NAME: z.string().default('Ethereum'),

  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration - ${problems.join('; ')}`);
  }
  return parsed.data;
}
