export * from './types/article';
export { loadEnvironmentConfig, DEFAULT_PLACEHOLDER_IMAGE_URL } from './config/environment';
export type { EnvironmentConfig } from './config/environment';
export { logger } from './utils/logger';
export { createRssTransport, toRawEntry, FeedFetchError } from './adapters/rss-feed';
export { normalizeEntry, extractImage, extractSummary } from './feeds/normalizer';
export { FeedAggregator, sortByPublishedDesc } from './feeds/aggregator';
export { FetchScheduler, isHourBlocked } from './feeds/scheduler';
export { PlaybackIndex } from './feeds/playback-index';
export { articleId } from './notifications/article-id';
export { SeenSet } from './notifications/seen-set';
export { NotificationQueue, DedupState, newCountsByFeed } from './notifications/notification-queue';
export { NotificationPresenter } from './notifications/presenter';
export { ConsoleNotificationChannel } from './notifications/channel';
export type { NotificationChannel, NotificationRequest, PresentResult, DismissEvent } from './notifications/channel';
export { FeedCoordinator } from './coordinator/feedCoordinator';
export type { CycleReport, PlaybackCommand } from './coordinator/feedCoordinator';
export { PlaybackController } from './playback/playbackController';
export { narrate, buildNarrationScript, splitText, truncateAtWord } from './speech/narration';
export type { SpeechPort } from './speech/narration';
