/**
 * FeedAggregator - fetches every configured feed, normalizes the entries and merges
 * them into one list, newest first.
 *
 * A failing feed only loses its own entries. When all feeds come back empty the
 * previous result is returned unchanged and flagged as not fresh, so callers can skip
 * notification work for that cycle.
 */

import pLimit from 'p-limit';
import type { AggregationResult, Article, FeedFetchResult, FeedSource, FeedTransport } from '../types/article';
import { normalizeEntry } from './normalizer';
import { logger } from '../utils/logger';
import { DEFAULT_PLACEHOLDER_IMAGE_URL } from '../config/environment';

export interface AggregatorOptions {
  concurrency: number;
  placeholderImageUrl?: string;
}

interface FeedOutcome {
  result: FeedFetchResult;
  articles: Article[];
}

export function sortByPublishedDesc(articles: Article[]): Article[] {
  // Array.prototype.sort is stable, so equal timestamps keep feed order
  return [...articles].sort((a, b) => (b.publishedAt ?? 0) - (a.publishedAt ?? 0));
}

export class FeedAggregator {
  private cached: Article[] = [];
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly placeholderImageUrl: string;

  constructor(private readonly transport: FeedTransport, options: AggregatorOptions) {
    this.limit = pLimit(options.concurrency);
    this.placeholderImageUrl = options.placeholderImageUrl ?? DEFAULT_PLACEHOLDER_IMAGE_URL;
  }

  getCached(): Article[] {
    return this.cached;
  }

  async aggregate(sources: FeedSource[]): Promise<AggregationResult> {
    const outcomes = await Promise.all(
      sources.map(source => this.limit(() => this.fetchSource(source)))
    );

    const merged = outcomes.flatMap(outcome => outcome.articles);
    const feeds = outcomes.map(outcome => outcome.result);
    const previous = this.cached;

    if (merged.length === 0) {
      logger.warn('[aggregator] No entries retrieved from any feed, keeping previous result', {
        cached: previous.length,
        failedFeeds: feeds.filter(feed => !feed.success).map(feed => feed.feedName)
      });
      return { articles: previous, previous, fresh: false, feeds };
    }

    this.cached = sortByPublishedDesc(merged);
    logger.info(`[aggregator] Aggregated ${this.cached.length} articles from ${sources.length} feeds`);
    return { articles: this.cached, previous, fresh: true, feeds };
  }

  private async fetchSource(source: FeedSource): Promise<FeedOutcome> {
    try {
      const entries = await this.transport(source);
      const articles = entries
        .slice(0, Math.max(0, source.maxEntries))
        .map(entry => normalizeEntry(entry, source.name, this.placeholderImageUrl));

      logger.debug(`[${source.name}] Normalized ${articles.length} of ${entries.length} entries`);
      return {
        result: { feedName: source.name, success: true, entryCount: articles.length },
        articles
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[${source.name}] Feed fetch failed, skipping this feed`, error);
      return {
        result: { feedName: source.name, success: false, entryCount: 0, error: message },
        articles: []
      };
    }
  }
}
