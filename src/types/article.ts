// Article and feed types shared across the aggregator and notification pipeline

export interface FeedSource {
  name: string;              // Display name, also part of the article identity
  url: string;               // RSS or Atom URL
  maxEntries: number;        // Entries kept from this feed per cycle
}

export interface MediaReference {
  url?: string;
}

export interface ContentBlock {
  value?: string;
}

// Schema-neutral shape of one parsed feed entry; every field is optional
export interface RawFeedEntry {
  title?: string;
  link?: string;
  published?: string;
  enclosures?: MediaReference[];
  mediaContent?: MediaReference[];
  mediaThumbnail?: MediaReference[];
  content?: ContentBlock[];
  summary?: string;
  description?: string;
}

export interface Article {
  readonly title: string;
  readonly link: string;
  readonly imageUrl: string;
  readonly feedName: string;
  readonly summary?: string;
  readonly published?: string;     // As supplied by the feed
  readonly publishedAt?: number;   // Epoch milliseconds, absent when missing or unparseable
}

export type FeedTransport = (source: FeedSource) => Promise<RawFeedEntry[]>;

export interface FeedFetchResult {
  feedName: string;
  success: boolean;
  entryCount: number;
  error?: string;
}

export interface AggregationResult {
  articles: Article[];
  previous: Article[];
  fresh: boolean;            // false when every feed came back empty and the cache was reused
  feeds: FeedFetchResult[];
}
