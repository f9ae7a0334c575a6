import dotenv from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './lib/errors.js';
import { logger } from './lib/logger.js';

dotenv.config();

const rate = z.number().min(0).max(1);

const marketSchema = z.object({
  name: z.string().min(1),
  id: z.number().int().positive()
});

const pairSchema = z.tuple([z.string().min(1), z.string().min(1)]);

const apiSchema = z.object({
  baseUrl: z.string().url(),
  userAgent: z.string().min(1),
  timeoutMs: z.number().int().positive(),
  maxAttempts: z.number().int().positive(),
  backoffBaseMs: z.number().nonnegative(),
  rateLimitThreshold: z.number().int().nonnegative(),
  rateLimitCooldownMs: z.number().nonnegative()
});

const feesSchema = z.object({
  brokerFeeBuy: rate,
  brokerFeeSell: rate,
  salesTax: rate,
  transportCostPerBulk: z.number().nonnegative()
});

const filtersSchema = z.object({
  minProfitMarginPct: z.number(),
  minNetProfit: z.number(),
  maxInvestmentPerItem: z.number(),
  minVolumeAvailable: z.number()
});

const configSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  databasePath: z.string().min(1),
  api: apiSchema,
  markets: z.array(marketSchema).min(1),
  pairs: z.array(pairSchema),
  fees: feesSchema,
  filters: filtersSchema,
  cache: z.object({
    orderTtlMinutes: z.number().positive(),
    itemTtlHours: z.number().positive(),
    placeholderTtlMinutes: z.number().nonnegative()
  }),
  scan: z.object({
    concurrency: z.number().int().positive(),
    itemFetchConcurrency: z.number().int().positive(),
    intervalSeconds: z.number().nonnegative(),
    timeoutSeconds: z.number().nonnegative()
  })
});

export type AppConfig = z.infer<typeof configSchema>;
export type ApiConfig = AppConfig['api'];
export type FeeConfig = AppConfig['fees'];
export type OpportunityFilters = AppConfig['filters'];
export type MarketConfig = AppConfig['markets'][number];
export type MarketPair = AppConfig['pairs'][number];

const list = (value: string | undefined, fallback: string): string[] =>
  (value ?? fallback)
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

// "Name:1001" -> { name, id }; a missing id becomes NaN and fails validation
const parseMarkets = (value: string | undefined) =>
  list(value, 'Northport:1001,Eastgate:1002,Southmere:1003').map((entry) => {
    const separator = entry.lastIndexOf(':');
    return {
      name: separator > 0 ? entry.slice(0, separator).trim() : entry,
      id: separator > 0 ? Number(entry.slice(separator + 1)) : Number.NaN
    };
  });

const parsePairs = (value: string | undefined) =>
  list(value, 'Northport:Eastgate,Northport:Southmere').map((entry) =>
    entry.split(':').map((name) => name.trim())
  );

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    env: env.NODE_ENV ?? 'development',
    logLevel: (env.LOG_LEVEL ?? 'info').toLowerCase(),
    databasePath: env.DATABASE_PATH ?? 'data/market.sqlite',
    api: {
      baseUrl: env.MARKET_API_BASE_URL ?? 'https://market.example/api',
      userAgent: env.MARKET_API_USER_AGENT ?? 'market-arbitrage-scanner/0.1',
      timeoutMs: Number(env.MARKET_API_TIMEOUT_MS ?? 15_000),
      maxAttempts: Number(env.MARKET_API_MAX_ATTEMPTS ?? 3),
      backoffBaseMs: Number(env.MARKET_API_BACKOFF_BASE_MS ?? 1_000),
      rateLimitThreshold: Number(env.RATE_LIMIT_THRESHOLD ?? 20),
      rateLimitCooldownMs: Number(env.RATE_LIMIT_COOLDOWN_MS ?? 2_000)
    },
    markets: parseMarkets(env.MARKETS),
    pairs: parsePairs(env.SCAN_PAIRS),
    fees: {
      brokerFeeBuy: Number(env.BROKER_FEE_BUY ?? 0.03),
      brokerFeeSell: Number(env.BROKER_FEE_SELL ?? 0.03),
      salesTax: Number(env.SALES_TAX ?? 0.08),
      transportCostPerBulk: Number(env.TRANSPORT_COST_PER_BULK ?? 800)
    },
    filters: {
      minProfitMarginPct: Number(env.MIN_PROFIT_MARGIN_PCT ?? 10),
      minNetProfit: Number(env.MIN_NET_PROFIT ?? 1_000_000),
      maxInvestmentPerItem: Number(env.MAX_INVESTMENT_PER_ITEM ?? 0),
      minVolumeAvailable: Number(env.MIN_VOLUME_AVAILABLE ?? 1)
    },
    cache: {
      orderTtlMinutes: Number(env.ORDER_CACHE_TTL_MINUTES ?? 5),
      itemTtlHours: Number(env.ITEM_CACHE_TTL_HOURS ?? 24),
      placeholderTtlMinutes: Number(env.ITEM_PLACEHOLDER_TTL_MINUTES ?? 15)
    },
    scan: {
      concurrency: Number(env.SCAN_CONCURRENCY ?? 2),
      itemFetchConcurrency: Number(env.ITEM_FETCH_CONCURRENCY ?? 4),
      intervalSeconds: Number(env.SCAN_INTERVAL_SECONDS ?? 0),
      timeoutSeconds: Number(env.SCAN_TIMEOUT_SECONDS ?? 0)
    }
  };

  const parsed = configSchema.safeParse(rawConfig);

  if (!parsed.success) {
    logger.error('Invalid configuration', {
      fieldErrors: parsed.error.flatten().fieldErrors
    });
    throw new ValidationError('Configuration validation failed');
  }

  return Object.freeze(parsed.data);
}
