import Parser from 'rss-parser';
import pRetry from 'p-retry';
import type { FeedSource, FeedTransport, MediaReference, RawFeedEntry } from '../types/article';
import { logger } from '../utils/logger';

// xml2js element carrying attributes, e.g. <media:content url="..." medium="image"/>
interface XmlMediaElement {
  $?: { url?: string };
}

export interface FeedItemFields {
  mediaContent?: XmlMediaElement[];
  mediaThumbnail?: XmlMediaElement[];
  contentEncoded?: string;
  description?: string;
}

export type FeedItem = Parser.Item & FeedItemFields;

export interface RssTransportOptions {
  timeoutMs: number;
  retries: number;
}

export class FeedFetchError extends Error {
  readonly feedName: string;
  readonly url: string;

  constructor(source: FeedSource, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to fetch feed "${source.name}" (${source.url}): ${reason}`, { cause });
    this.name = 'FeedFetchError';
    this.feedName = source.name;
    this.url = source.url;
  }
}

function mediaReferences(elements: XmlMediaElement[] | undefined): MediaReference[] | undefined {
  if (!elements || elements.length === 0) return undefined;
  return elements.map(element => ({ url: element.$?.url }));
}

/**
 * Map an rss-parser item onto the schema-neutral entry the normalizer reads.
 * For RSS, rss-parser copies <description> into `content`, so `content` only counts
 * as a content block when no description was present (Atom <content>).
 */
export function toRawEntry(item: FeedItem): RawFeedEntry {
  const contentValue = item.contentEncoded ?? (item.description === undefined ? item.content : undefined);

  return {
    title: item.title,
    link: item.link,
    published: item.pubDate ?? item.isoDate,
    enclosures: item.enclosure ? [{ url: item.enclosure.url }] : undefined,
    mediaContent: mediaReferences(item.mediaContent),
    mediaThumbnail: mediaReferences(item.mediaThumbnail),
    content: contentValue ? [{ value: contentValue }] : undefined,
    summary: item.summary,
    description: item.description
  };
}

export function createRssTransport(options: RssTransportOptions): FeedTransport {
  const parser = new Parser<Record<string, unknown>, FeedItemFields>({
    timeout: options.timeoutMs,
    customFields: {
      item: [
        ['media:content', 'mediaContent', { keepArray: true }],
        ['media:thumbnail', 'mediaThumbnail', { keepArray: true }],
        ['content:encoded', 'contentEncoded'],
        ['description', 'description']
      ]
    }
  });

  return async (source: FeedSource): Promise<RawFeedEntry[]> => {
    try {
      const feed = await pRetry(() => parser.parseURL(source.url), {
        retries: options.retries,
        factor: 2,
        minTimeout: 500,
        maxTimeout: 5000,
        onFailedAttempt: error => {
          logger.warn(`[${source.name}] Fetch attempt ${error.attemptNumber} failed (${error.retriesLeft} retries left): ${error.message}`);
        }
      });

      logger.debug(`[${source.name}] Found ${feed.items.length} items in feed`);
      return feed.items.map(toRawEntry);
    } catch (error) {
      throw new FeedFetchError(source, error);
    }
  };
}
