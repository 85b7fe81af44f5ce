/**
 * Environment configuration for feed-herald
 * Loads and validates environment variables
 */

import { z } from 'zod';
import type { FeedSource } from '../types/article';
import type { LogLevel } from '../utils/logger';

export const DEFAULT_PLACEHOLDER_IMAGE_URL = 'https://placehold.co/192x192/png?text=News';

export interface EnvironmentConfig {
  feeds: FeedSource[];
  polling: {
    refreshIntervalMs: number;
    blockStartHour: number;
    blockEndHour: number;
  };
  fetch: {
    concurrency: number;
    retries: number;
    timeoutMs: number;
  };
  notifications: {
    enabled: boolean;
    summaryEnabled: boolean;
    sessionId: string;
    dismissDelayMs: number;
    maxQueueSize: number;
    seenCapacity: number;
  };
  articles: {
    placeholderImageUrl: string;
    inclusions: string[];
  };
  playback: {
    pauseSeconds: number;
  };
  narration: {
    includeSummary: boolean;
    introMediaUrl?: string;
    closingPhrase?: string;
  };
  logging: {
    level: LogLevel;
  };
}

const feedEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  maxEntries: z.number().int().min(0).optional()
});

// FEEDS accepts either {"Name": "https://..."} or [{"name": ..., "url": ..., "maxEntries": ...}]
const feedsSchema = z.union([
  z.record(z.string().url()),
  z.array(feedEntrySchema).min(1)
]);

const jsonFeeds = z
  .string({ required_error: 'FEEDS is required' })
  .transform((raw, ctx): unknown => {
    try {
      return JSON.parse(raw);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `FEEDS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      });
      return z.NEVER;
    }
  })
  .pipe(feedsSchema);

const integer = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value === '' ? fallback : value.toLowerCase() !== 'false'));

const envSchema = z.object({
  FEEDS: jsonFeeds,
  ARTICLES_PER_FEED: integer(5, 0),
  REFRESH_INTERVAL_SECONDS: integer(3600, 1),
  BLOCK_START_HOUR: integer(23, 0, 23),
  BLOCK_END_HOUR: integer(6, 0, 23),
  NOTIFICATIONS_ENABLED: flag(true),
  SUMMARY_NOTIFICATIONS: flag(true),
  DISMISS_DELAY_SECONDS: z.coerce.number().min(0).default(3),
  MAX_QUEUE_SIZE: integer(10, 1),
  SEEN_CAPACITY: integer(500, 1),
  SESSION_ID: z.string().min(1).default('feedherald'),
  PLACEHOLDER_IMAGE_URL: z.string().url().default(DEFAULT_PLACEHOLDER_IMAGE_URL),
  FETCH_CONCURRENCY: integer(4, 1),
  FETCH_RETRIES: integer(2, 0),
  FETCH_TIMEOUT_MS: integer(15000, 1),
  PAUSE_SECONDS: z.coerce.number().min(0).default(5),
  INCLUSIONS: z.string().default(''),
  NARRATION_INTRO_URL: z.string().url().optional(),
  NARRATION_CLOSING_PHRASE: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

function toFeedSources(feeds: z.infer<typeof feedsSchema>, articlesPerFeed: number): FeedSource[] {
  if (Array.isArray(feeds)) {
    return feeds.map(feed => ({
      name: feed.name,
      url: feed.url,
      maxEntries: feed.maxEntries ?? articlesPerFeed
    }));
  }
  return Object.entries(feeds).map(([name, url]) => ({ name, url, maxEntries: articlesPerFeed }));
}

/**
 * Load and validate environment configuration
 * @throws Error listing every invalid or missing variable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  // Empty strings count as unset so defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  const inclusions = vars.INCLUSIONS.split(',').map(item => item.trim()).filter(Boolean);
  return {
    feeds: toFeedSources(vars.FEEDS, vars.ARTICLES_PER_FEED),
    polling: {
      refreshIntervalMs: vars.REFRESH_INTERVAL_SECONDS * 1000,
      blockStartHour: vars.BLOCK_START_HOUR,
      blockEndHour: vars.BLOCK_END_HOUR
    },
    fetch: {
      concurrency: vars.FETCH_CONCURRENCY,
      retries: vars.FETCH_RETRIES,
      timeoutMs: vars.FETCH_TIMEOUT_MS
    },
    notifications: {
      enabled: vars.NOTIFICATIONS_ENABLED,
      summaryEnabled: vars.SUMMARY_NOTIFICATIONS,
      sessionId: vars.SESSION_ID,
      dismissDelayMs: vars.DISMISS_DELAY_SECONDS * 1000,
      maxQueueSize: vars.MAX_QUEUE_SIZE,
      seenCapacity: vars.SEEN_CAPACITY
    },
    articles: {
      placeholderImageUrl: vars.PLACEHOLDER_IMAGE_URL,
      inclusions
    },
    playback: {
      pauseSeconds: vars.PAUSE_SECONDS
    },
    narration: {
      includeSummary: inclusions.includes('summary'),
      introMediaUrl: vars.NARRATION_INTRO_URL,
      closingPhrase: vars.NARRATION_CLOSING_PHRASE
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}
