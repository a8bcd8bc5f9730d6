/**
 * Environment configuration
 *
 * Loads .env (entry points only) and validates overrides on top of the
 * defaults in models/config.ts.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError, formatZodIssues } from './errors.js';
import { DEFAULT_ROUTER_CONFIG, type RouterConfig } from './models/index.js';

export interface AppConfig {
  databasePath: string;
  logLevel: string;
  router: RouterConfig;
}

const probability = z.coerce.number().min(0).max(1);
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('./data/knowledge.db'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  THRESHOLD_HIGH: probability.optional(),
  THRESHOLD_MEDIUM: probability.optional(),
  THRESHOLD_LOW: probability.optional(),
  ASSET_MIN_CONFIDENCE: probability.optional(),
  SENDER_MATCH_CONFIDENCE: probability.optional(),
  SENDER_TRUST_FLOOR: probability.optional(),
  SIMILARITY_TIMEOUT_MS: positiveInt.optional(),
  SIMILARITY_MIN: probability.optional(),
  MAX_CONCURRENT_EMAILS: positiveInt.optional(),
  MAX_CONCURRENT_ATTACHMENTS: positiveInt.optional(),
  EPISODIC_MAX_RECORDS: positiveInt.optional(),
  EPISODIC_MAX_AGE_DAYS: positiveInt.optional(),
  BOOTSTRAP_STALE_CLAIM_MS: positiveInt.optional(),
});

//load .env from the working directory, returns whether a file was read
export function initEnv(path?: string): boolean {
  const result = loadDotenv(path ? { path } : {});
  return result.error === undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(formatZodIssues(parsed.error));
  const e = parsed.data;
  const d = DEFAULT_ROUTER_CONFIG;

  const thresholds = {
    high: e.THRESHOLD_HIGH ?? d.thresholds.high,
    medium: e.THRESHOLD_MEDIUM ?? d.thresholds.medium,
    low: e.THRESHOLD_LOW ?? d.thresholds.low,
  };
  if (!(thresholds.high > thresholds.medium && thresholds.medium > thresholds.low)) {
    throw new ConfigError([`thresholds must satisfy high > medium > low (got ${thresholds.high}/${thresholds.medium}/${thresholds.low})`]);
  }

  return {
    databasePath: e.DATABASE_PATH,
    logLevel: e.LOG_LEVEL,
    router: {
      ...d,
      thresholds,
      assetMatch: {
        ...d.assetMatch,
        minAssetConfidence: e.ASSET_MIN_CONFIDENCE ?? d.assetMatch.minAssetConfidence,
        senderMatchConfidence: e.SENDER_MATCH_CONFIDENCE ?? d.assetMatch.senderMatchConfidence,
        senderTrustFloor: e.SENDER_TRUST_FLOOR ?? d.assetMatch.senderTrustFloor,
      },
      experience: {
        ...d.experience,
        timeoutMs: e.SIMILARITY_TIMEOUT_MS ?? d.experience.timeoutMs,
        minSimilarity: e.SIMILARITY_MIN ?? d.experience.minSimilarity,
      },
      concurrency: {
        maxConcurrentEmails: e.MAX_CONCURRENT_EMAILS ?? d.concurrency.maxConcurrentEmails,
        maxConcurrentAttachments: e.MAX_CONCURRENT_ATTACHMENTS ?? d.concurrency.maxConcurrentAttachments,
      },
      retention: {
        ...d.retention,
        maxRecords: e.EPISODIC_MAX_RECORDS ?? d.retention.maxRecords,
        maxAgeDays: e.EPISODIC_MAX_AGE_DAYS ?? d.retention.maxAgeDays,
      },
      bootstrap: {
        staleClaimMs: e.BOOTSTRAP_STALE_CLAIM_MS ?? d.bootstrap.staleClaimMs,
      },
    },
  };
}
