/**
 * PlaybackController - media-player style view over the aggregated articles.
 * Rotates through the list on a timer while playing.
 */

import type { Article } from '../types/article';
import { formatTimestamp, formatUtcDate, formatUtcTime } from '../utils/time';
import { logger } from '../utils/logger';

export type PlaybackState = 'idle' | 'playing' | 'paused';

export interface PlaybackSource {
  readonly index: { readonly value: number };
  readonly lastRefresh: number | null;
  getAggregation(): Article[];
  currentArticle(): Article | undefined;
  advanceIndex(): Promise<number>;
  retreatIndex(): Promise<number>;
}

export interface PlaybackOptions {
  pauseSeconds: number;
  inclusions: string[];
}

export type PlaybackAttributes = Record<string, string | number>;

const ARTICLE_FIELDS = ['title', 'link', 'imageUrl', 'feedName', 'summary', 'published'] as const;
type ArticleField = (typeof ARTICLE_FIELDS)[number];

// Always exposed, whatever the configured inclusions
const DEFAULT_FIELDS: ArticleField[] = ['feedName', 'imageUrl'];

function isArticleField(field: string): field is ArticleField {
  return ARTICLE_FIELDS.some(known => known === field);
}

export class PlaybackController {
  private playing = false;
  private timer: NodeJS.Timeout | null = null;
  private readonly fields: ArticleField[];

  constructor(private readonly source: PlaybackSource, private readonly options: PlaybackOptions) {
    const requested = options.inclusions.filter(isArticleField);
    this.fields = [...new Set<ArticleField>([...requested, ...DEFAULT_FIELDS])];
  }

  get state(): PlaybackState {
    if (this.source.getAggregation().length === 0) return 'idle';
    return this.playing ? 'playing' : 'paused';
  }

  get mediaTitle(): string {
    return this.source.currentArticle()?.title ?? 'No articles';
  }

  get mediaContentId(): string | undefined {
    return this.source.currentArticle()?.link;
  }

  play() {
    if (this.source.getAggregation().length === 0 || this.playing) return;
    this.playing = true;
    this.scheduleAdvance();
  }

  pause() {
    this.halt();
  }

  stop() {
    this.halt();
  }

  async next() {
    if (this.source.getAggregation().length === 0) return;
    await this.source.advanceIndex();
    this.resume();
  }

  async previous() {
    if (this.source.getAggregation().length === 0) return;
    await this.source.retreatIndex();
    this.resume();
  }

  attributes(): PlaybackAttributes {
    const articles = this.source.getAggregation();
    const article = this.source.currentArticle();
    if (!article) return {};

    const attributes: PlaybackAttributes = {
      article_number: `${(this.source.index.value % articles.length) + 1}/${articles.length}`
    };

    if (this.source.lastRefresh !== null) {
      attributes.last_refresh = formatTimestamp(this.source.lastRefresh);
    }
    if (article.publishedAt !== undefined) {
      attributes.published_time = `${formatUtcTime(article.publishedAt)} o'clock`;
      attributes.published_date = formatUtcDate(article.publishedAt);
    }

    for (const field of this.fields) {
      const value = article[field];
      if (value !== undefined) {
        attributes[field] = value;
      }
    }
    return attributes;
  }

  // Selecting an article restarts the countdown so it gets a full pause
  private resume() {
    this.playing = true;
    this.scheduleAdvance();
  }

  private halt() {
    this.playing = false;
    this.clearTimer();
  }

  private scheduleAdvance() {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      if (!this.playing || this.source.getAggregation().length === 0) {
        this.playing = false;
        return;
      }
      void this.source
        .advanceIndex()
        .then(() => {
          if (this.playing) this.scheduleAdvance();
        })
        .catch(error => {
          logger.error('[playback] Auto-advance failed', error);
          this.halt();
        });
    }, this.options.pauseSeconds * 1000);
  }

  private clearTimer() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
