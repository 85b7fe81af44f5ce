/**
 * Deduplication state for article notifications
 *
 * Holds the seen set, the bounded backlog of articles waiting to be presented and the
 * high-water mark (published time of the newest presented article). An article is
 * only marked seen when it is actually presented; sitting in the queue does not count.
 */

import type { Article } from '../types/article';
import { articleId } from './article-id';
import { SeenSet } from './seen-set';

export interface QueuedArticle {
  id: string;
  article: Article;
}

/**
 * Bounded FIFO. Enqueueing into a full queue, or an id already queued, is a no-op:
 * members are never evicted to make room.
 */
export class NotificationQueue {
  private readonly items: QueuedArticle[] = [];

  constructor(readonly capacity: number) {}

  enqueue(article: Article): boolean {
    const id = articleId(article);
    if (this.items.length >= this.capacity || this.has(id)) {
      return false;
    }
    this.items.push({ id, article });
    return true;
  }

  has(id: string): boolean {
    return this.items.some(item => item.id === id);
  }

  peek(): QueuedArticle | undefined {
    return this.items[0];
  }

  shift(): QueuedArticle | undefined {
    return this.items.shift();
  }

  ids(): string[] {
    return this.items.map(item => item.id);
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }
}

export interface DedupOptions {
  maxQueueSize: number;
  seenCapacity: number;
}

export class DedupState {
  readonly seen: SeenSet;
  readonly queue: NotificationQueue;
  private lastShownPublished: number | undefined;

  constructor(options: DedupOptions) {
    this.seen = new SeenSet(options.seenCapacity);
    this.queue = new NotificationQueue(options.maxQueueSize);
  }

  get highWaterMark(): number | undefined {
    return this.lastShownPublished;
  }

  isSeen(article: Article): boolean {
    return this.seen.has(articleId(article));
  }

  /** Unseen, carries a timestamp, and newer than anything presented so far. */
  isNovel(article: Article): boolean {
    if (this.isSeen(article)) return false;
    if (article.publishedAt === undefined) return false;
    return this.lastShownPublished === undefined || article.publishedAt > this.lastShownPublished;
  }

  /**
   * Queue every novel article not queued yet, oldest first, so presentation runs in
   * publication order. Returns the number added.
   */
  enqueueNovel(articles: Article[]): number {
    const candidates = articles
      .filter(article => this.isNovel(article))
      .sort((a, b) => (a.publishedAt ?? 0) - (b.publishedAt ?? 0));

    let added = 0;
    for (const article of candidates) {
      if (this.queue.enqueue(article)) {
        added++;
      }
    }
    return added;
  }

  markPresented(article: Article, now: number) {
    this.seen.add(articleId(article));
    const shown = article.publishedAt ?? now;
    if (this.lastShownPublished === undefined || shown > this.lastShownPublished) {
      this.lastShownPublished = shown;
    }
  }

  unseen(articles: Article[]): Article[] {
    return articles.filter(article => !this.isSeen(article));
  }
}

/**
 * Per-feed count of articles in `current` whose id was not in `previous`,
 * in order of first appearance.
 */
export function newCountsByFeed(current: Article[], previous: Article[]): Map<string, number> {
  const previousIds = new Set(previous.map(articleId));
  const counts = new Map<string, number>();

  for (const article of current) {
    if (previousIds.has(articleId(article))) continue;
    const feed = article.feedName || 'Unknown';
    counts.set(feed, (counts.get(feed) ?? 0) + 1);
  }
  return counts;
}
