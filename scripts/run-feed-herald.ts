#!/usr/bin/env tsx

/**
 * Runs feed-herald in the terminal
 * Notifications are printed and auto-dismissed; stdin accepts playback commands:
 *   next | previous | refresh | play | pause | speak | status | dismiss | quit
 */

import dotenv from 'dotenv';
import path from 'path';
import readline from 'readline';

const projectRoot = path.resolve(__dirname, '..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { loadEnvironmentConfig } from '../src/config/environment';
import { logger } from '../src/utils/logger';
import { createRssTransport } from '../src/adapters/rss-feed';
import { ConsoleNotificationChannel } from '../src/notifications/channel';
import { FeedCoordinator } from '../src/coordinator/feedCoordinator';
import { PlaybackController } from '../src/playback/playbackController';
import { narrate, type SpeechPort } from '../src/speech/narration';

const AUTO_DISMISS_MS = 10_000;

const consoleSpeaker: SpeechPort = {
  async speak(message: string) {
    console.log(`🔊 ${message}`);
  },
  async playMedia(url: string) {
    console.log(`🎵 ${url}`);
  }
};

async function main() {
  const config = loadEnvironmentConfig();
  logger.setLevel(config.logging.level);

  const channel = new ConsoleNotificationChannel(AUTO_DISMISS_MS);
  const coordinator = new FeedCoordinator(config, {
    transport: createRssTransport(config.fetch),
    channel
  });
  const player = new PlaybackController(coordinator, {
    pauseSeconds: config.playback.pauseSeconds,
    inclusions: config.articles.inclusions
  });

  console.log(`📰 Watching ${config.feeds.length} feeds: ${config.feeds.map(feed => feed.name).join(', ')}`);
  const report = await coordinator.start();
  console.log(`   • ${report.articles.length} articles aggregated`);

  const input = readline.createInterface({ input: process.stdin });

  const shutdown = () => {
    player.stop();
    coordinator.shutdown();
    channel.close();
    input.close();
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  input.on('line', line => {
    handleLine(line.trim()).catch(error => logger.error(`Command "${line.trim()}" failed`, error));
  });

  async function handleLine(command: string) {
    switch (command) {
      case 'next':
        await player.next();
        break;
      case 'previous':
        await player.previous();
        break;
      case 'refresh':
        await coordinator.handleCommand('refresh');
        break;
      case 'play':
        player.play();
        break;
      case 'pause':
        player.pause();
        break;
      case 'speak':
        await narrate(coordinator.getAggregation(), consoleSpeaker, {
          pauseSeconds: 0,
          includeSummary: config.narration.includeSummary,
          introMediaUrl: config.narration.introMediaUrl,
          closingPhrase: config.narration.closingPhrase
        });
        return;
      case 'dismiss':
        channel.dismiss(config.notifications.sessionId);
        channel.dismiss(`${config.notifications.sessionId}_summary`);
        return;
      case 'quit':
        shutdown();
        return;
      case 'status':
        await coordinator.settled();
        break;
      default:
        console.log(`Unknown command: ${command}`);
        return;
    }
    console.log(`▶ [${player.state}] ${player.mediaTitle}`, player.attributes());
    console.log(`   • ${coordinator.getUnseen().length} unseen, ${coordinator.queuedIds.length} queued`);
  }
}

main().catch(error => {
  console.error('\n💥 feed-herald failed to start');
  console.error('Error:', error);
  process.exit(1);
});
