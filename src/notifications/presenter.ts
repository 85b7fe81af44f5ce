/**
 * NotificationPresenter - single-slot presentation protocol
 *
 * idle --present(article)--> active --dismiss(own id)--> idle (+ delayed drain)
 *
 * While active, nothing else is presented. A channel that is unavailable (or throws)
 * leaves the presenter idle and the article unseen, so it stays a candidate.
 */

import type { Article } from '../types/article';
import type { Clock } from '../utils/time';
import { systemClock } from '../utils/time';
import { logger } from '../utils/logger';
import { articleId } from './article-id';
import type { DismissEvent, NotificationChannel, NotificationRequest } from './channel';
import type { DedupState } from './notification-queue';
import {
  ARTICLE_NOTIFICATION_TITLE,
  SUMMARY_NOTIFICATION_TITLE,
  articleNotificationId,
  composeArticleMessage,
  composeSummaryMessage,
  summaryNotificationId
} from './messages';

export type PresenterState = 'idle' | 'active';

export type DrainRunner = (drain: () => Promise<boolean>) => Promise<unknown>;

export interface PresenterOptions {
  enabled: boolean;
  sessionId: string;
  dismissDelayMs: number;
  clock?: Clock;
  // Lets the owner serialize delayed drains with its other work
  runDrain?: DrainRunner;
}

export interface PresentOptions {
  isLast?: boolean;
}

export class NotificationPresenter {
  private current: PresenterState = 'idle';
  private drainTimer: NodeJS.Timeout | null = null;
  private readonly clock: Clock;
  private readonly runDrain: DrainRunner;

  constructor(
    private readonly channel: NotificationChannel,
    private readonly dedup: DedupState,
    private readonly options: PresenterOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.runDrain = options.runDrain ?? (drain => drain());
  }

  get state(): PresenterState {
    return this.current;
  }

  get hasPendingDrain(): boolean {
    return this.drainTimer !== null;
  }

  get notificationIds(): string[] {
    return [articleNotificationId(this.options.sessionId), summaryNotificationId(this.options.sessionId)];
  }

  async present(article: Article | undefined, presentOptions: PresentOptions = {}): Promise<boolean> {
    if (!this.options.enabled || this.current === 'active' || !article) {
      return false;
    }
    if (this.dedup.seen.has(articleId(article))) {
      return false;
    }

    // Claim the slot before awaiting the channel
    this.current = 'active';
    const delivered = await this.deliver({
      id: articleNotificationId(this.options.sessionId),
      title: ARTICLE_NOTIFICATION_TITLE,
      message: composeArticleMessage(article, presentOptions.isLast ?? false)
    });

    if (!delivered) {
      this.current = 'idle';
      return false;
    }

    this.dedup.markPresented(article, this.clock.now());
    logger.info(`[presenter] Presented "${article.title}" from ${article.feedName}`);
    return true;
  }

  async presentSummary(counts: Map<string, number>): Promise<boolean> {
    if (!this.options.enabled || counts.size === 0) {
      return false;
    }

    const delivered = await this.deliver({
      id: summaryNotificationId(this.options.sessionId),
      title: SUMMARY_NOTIFICATION_TITLE,
      message: composeSummaryMessage(counts)
    });

    if (delivered) {
      this.current = 'active';
    }
    return delivered;
  }

  /**
   * Present the oldest queued article if the slot is free. Queue heads that were seen
   * in the meantime are dropped; the head is only removed once it was presented.
   */
  async drainNext(): Promise<boolean> {
    const queue = this.dedup.queue;

    while (this.current === 'idle' && queue.size > 0) {
      const head = queue.peek();
      if (!head) break;

      if (this.dedup.seen.has(head.id)) {
        queue.shift();
        continue;
      }

      const presented = await this.present(head.article, { isLast: queue.size === 1 });
      if (!presented) {
        return false;
      }
      if (queue.peek()?.id === head.id) {
        queue.shift();
      }
      return true;
    }
    return false;
  }

  handleDismiss(event: DismissEvent): boolean {
    if (!this.notificationIds.includes(event.notificationId)) {
      return false;
    }

    logger.debug(`[presenter] Notification ${event.notificationId} dismissed`);
    this.current = 'idle';
    this.scheduleDrain();
    return true;
  }

  cancelPendingDrain() {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
  }

  private scheduleDrain() {
    this.cancelPendingDrain();
    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      this.runDrain(() => this.drainNext()).catch(error => {
        logger.error('[presenter] Draining the notification queue failed', error);
      });
    }, this.options.dismissDelayMs);
  }

  private async deliver(request: NotificationRequest): Promise<boolean> {
    try {
      const result = await this.channel.present(request);
      if (result === 'unavailable') {
        logger.warn(`[presenter] Notification channel not available for ${request.id}`);
        return false;
      }
      return true;
    } catch (error) {
      logger.error(`[presenter] Notification channel failed for ${request.id}`, error);
      return false;
    }
  }
}
