/**
 * FeedCoordinator - owns the session state and runs the fetch cycle
 *
 * Each cycle:
 * 1. Asks the scheduler whether fetching is allowed (blackout window / override)
 * 2. Aggregates all feeds (falling back to the previous result on total failure)
 * 3. Presents a per-feed new-count summary when the result changed
 * 4. Bootstraps with the newest article, or queues novel articles and drains the queue
 *
 * Cycles, dismiss events and playback commands all run through one serial queue, so
 * the dedup state and the presenter only ever see one writer at a time.
 */

import pLimit from 'p-limit';
import type { AggregationResult, Article, FeedSource, FeedTransport } from '../types/article';
import type { EnvironmentConfig } from '../config/environment';
import { FeedAggregator } from '../feeds/aggregator';
import { FetchScheduler } from '../feeds/scheduler';
import { PlaybackIndex } from '../feeds/playback-index';
import { DedupState, newCountsByFeed } from '../notifications/notification-queue';
import { NotificationPresenter } from '../notifications/presenter';
import type { DismissEvent, NotificationChannel } from '../notifications/channel';
import type { Clock } from '../utils/time';
import { systemClock } from '../utils/time';
import { logger } from '../utils/logger';

export type CoordinatorConfig = Pick<EnvironmentConfig, 'feeds' | 'polling' | 'fetch' | 'notifications' | 'articles'>;

export interface CoordinatorDependencies {
  transport: FeedTransport;
  channel: NotificationChannel;
  clock?: Clock;
}

export type PlaybackCommand = 'next' | 'previous' | 'refresh';

export interface CycleReport {
  skipped: boolean;          // Blocked by the blackout window, cached articles served
  fresh: boolean;            // New data was aggregated this cycle
  articles: Article[];
  summaryPresented: boolean;
  bootstrapped: boolean;
  enqueued: number;
  presented: boolean;
}

export class FeedCoordinator {
  readonly index: PlaybackIndex;
  private readonly aggregator: FeedAggregator;
  private readonly scheduler: FetchScheduler;
  private readonly dedup: DedupState;
  private readonly presenter: NotificationPresenter;
  private readonly channel: NotificationChannel;
  private readonly clock: Clock;
  private readonly serial = pLimit(1);
  private unsubscribe: (() => void) | null = null;
  private lastUpdate: number | null = null;

  constructor(private readonly config: CoordinatorConfig, dependencies: CoordinatorDependencies) {
    this.clock = dependencies.clock ?? systemClock;
    this.channel = dependencies.channel;
    this.aggregator = new FeedAggregator(dependencies.transport, {
      concurrency: config.fetch.concurrency,
      placeholderImageUrl: config.articles.placeholderImageUrl
    });
    this.scheduler = new FetchScheduler({
      blockStartHour: config.polling.blockStartHour,
      blockEndHour: config.polling.blockEndHour,
      intervalMs: config.polling.refreshIntervalMs
    });
    this.dedup = new DedupState({
      maxQueueSize: config.notifications.maxQueueSize,
      seenCapacity: config.notifications.seenCapacity
    });
    this.presenter = new NotificationPresenter(this.channel, this.dedup, {
      enabled: config.notifications.enabled,
      sessionId: config.notifications.sessionId,
      dismissDelayMs: config.notifications.dismissDelayMs,
      clock: this.clock,
      runDrain: drain => this.serial(drain)
    });
    this.index = new PlaybackIndex(() => this.aggregator.getCached());
  }

  get feeds(): FeedSource[] {
    return this.config.feeds;
  }

  get lastRefresh(): number | null {
    return this.lastUpdate;
  }

  get presenterState() {
    return this.presenter.state;
  }

  get highWaterMark(): number | undefined {
    return this.dedup.highWaterMark;
  }

  get queuedIds(): string[] {
    return this.dedup.queue.ids();
  }

  async start(): Promise<CycleReport> {
    if (!this.unsubscribe) {
      this.unsubscribe = this.channel.onDismiss(event => {
        this.handleDismiss(event).catch(error => {
          logger.error('[coordinator] Failed to handle dismiss event', error);
        });
      });
    }

    const report = await this.refresh();
    this.scheduler.start(() => this.refresh());
    return report;
  }

  shutdown() {
    this.scheduler.stop();
    this.presenter.cancelPendingDrain();
    this.serial.clearQueue();
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    logger.info('[coordinator] Shut down');
  }

  /** One polling tick; waits behind any cycle or event already running. */
  refresh(): Promise<CycleReport> {
    return this.serial(() => this.runCycle());
  }

  /** Bypass the blackout window for exactly one cycle. */
  forceRefreshNow(): Promise<CycleReport> {
    return this.serial(() => {
      this.scheduler.requestOverride();
      return this.runCycle();
    });
  }

  /** Resolves once every cycle, event and drain queued so far has finished. */
  settled(): Promise<void> {
    return this.serial(() => undefined);
  }

  handleDismiss(event: DismissEvent): Promise<boolean> {
    return this.serial(() => this.presenter.handleDismiss(event));
  }

  async handleCommand(command: PlaybackCommand): Promise<void> {
    switch (command) {
      case 'next':
        await this.advanceIndex();
        break;
      case 'previous':
        await this.retreatIndex();
        break;
      case 'refresh':
        await this.forceRefreshNow();
        break;
    }
  }

  advanceIndex(): Promise<number> {
    return this.serial(() => this.index.advance());
  }

  retreatIndex(): Promise<number> {
    return this.serial(() => this.index.retreat());
  }

  getAggregation(): Article[] {
    return this.aggregator.getCached();
  }

  getUnseen(): Article[] {
    return this.dedup.unseen(this.aggregator.getCached());
  }

  currentArticle(): Article | undefined {
    return this.index.current();
  }

  private async runCycle(): Promise<CycleReport> {
    const hour = this.clock.currentHour();
    const report: CycleReport = {
      skipped: false,
      fresh: false,
      articles: this.aggregator.getCached(),
      summaryPresented: false,
      bootstrapped: false,
      enqueued: 0,
      presented: false
    };

    if (!this.scheduler.shouldFetch(hour)) {
      logger.info(`[coordinator] Fetching blocked at hour ${hour}, serving ${report.articles.length} cached articles`);
      return { ...report, skipped: true };
    }

    let result: AggregationResult;
    try {
      result = await this.aggregator.aggregate(this.config.feeds);
    } finally {
      this.scheduler.consumeOverride();
      this.lastUpdate = this.clock.now();
    }

    this.index.reset();
    report.articles = result.articles;
    report.fresh = result.fresh;

    if (!result.fresh || !this.config.notifications.enabled) {
      return report;
    }

    await this.notify(result, report);
    return report;
  }

  private async notify(result: AggregationResult, report: CycleReport) {
    // Diffing against an empty cache would report everything as new
    const counts =
      this.config.notifications.summaryEnabled && result.previous.length > 0
        ? newCountsByFeed(result.articles, result.previous)
        : new Map<string, number>();
    const summaryPending = counts.size > 0;

    if (summaryPending) {
      report.summaryPresented = await this.presenter.presentSummary(counts);
    }

    if (this.dedup.highWaterMark === undefined && !summaryPending) {
      // Nothing presented yet this session: show only the newest article
      report.bootstrapped = true;
      report.presented = await this.presenter.present(result.articles[0], { isLast: true });
      return;
    }

    report.enqueued = this.dedup.enqueueNovel(result.articles);
    if (report.enqueued > 0) {
      logger.info(`[coordinator] Queued ${report.enqueued} new articles (${this.dedup.queue.size} waiting)`);
    }

    // With a summary on screen the queue drains once it is dismissed
    if (!report.summaryPresented) {
      report.presented = await this.presenter.drainNext();
    }
  }
}
