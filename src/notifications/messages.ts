import type { Article } from '../types/article';
import { escapeHtml } from '../utils/html';
import { feedClockTime } from '../utils/time';

export const ARTICLE_NOTIFICATION_TITLE = 'Feed Herald';
export const SUMMARY_NOTIFICATION_TITLE = 'Feed Herald: New Articles';
export const LAST_MESSAGE_SUFFIX = '\n\nLast message';

export function articleNotificationId(sessionId: string): string {
  return sessionId;
}

export function summaryNotificationId(sessionId: string): string {
  return `${sessionId}_summary`;
}

// "<feed> | 14:05 – <title>", with the time only when the feed supplied one
export function composeArticleMessage(article: Article, isLast: boolean): string {
  const clock = feedClockTime(article.published);
  const timePrefix = clock ? `${clock} – ` : '';
  const suffix = isLast ? LAST_MESSAGE_SUFFIX : '';
  return `${escapeHtml(article.feedName)} | ${timePrefix}${article.title}${suffix}`;
}

export function composeSummaryMessage(counts: Map<string, number>): string {
  return [...counts.entries()]
    .map(([feed, count]) => `${feed}: ${count} new articles`)
    .join('\n');
}
