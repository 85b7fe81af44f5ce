/**
 * Narration - turns the aggregated articles into text-to-speech chunks and reads them
 * out, one article after another, through a SpeechPort.
 */

import type { Article } from '../types/article';
import { cleanHtml } from '../utils/html';
import { logger } from '../utils/logger';

export const MAX_TTS_TITLE = 180;
export const MAX_TTS_SUMMARY = 220;
export const MAX_TTS_CHUNK = 200;

// Characters per second assumed when waiting for speech to finish
const SPEECH_RATE = 15;

export interface SpeechPort {
  speak(message: string): Promise<void>;
  playMedia?(url: string): Promise<void>;
}

export interface NarrationPhrases {
  first: string;
  next: string;
  last: string;
  summary: string;
}

export const DEFAULT_PHRASES: NarrationPhrases = {
  first: 'First item',
  next: 'Next item',
  last: 'Last item',
  summary: 'Summary'
};

export interface NarrationOptions {
  includeSummary: boolean;
  pauseSeconds: number;
  introMediaUrl?: string;
  closingPhrase?: string;
  phrases?: NarrationPhrases;
  sleep?: (ms: number) => Promise<void>;
}

export interface NarrationSegment {
  article: Article;
  chunks: string[];
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** Split into chunks of at most `maxLen` characters without breaking words. */
export function splitText(text: string, maxLen = MAX_TTS_CHUNK): string[] {
  const words = text.match(/\S+\s*/g) ?? [];
  const chunks: string[] = [];
  let current = '';

  for (const word of words) {
    if (current.length + word.length > maxLen) {
      chunks.push(current.trim());
      current = word;
    } else {
      current += word;
    }
  }
  if (current) {
    chunks.push(current.trim());
  }
  return chunks.filter(Boolean);
}

export function truncateAtWord(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  const cut = text.slice(0, maxLen);
  const lastSpace = cut.lastIndexOf(' ');
  return `${lastSpace === -1 ? cut : cut.slice(0, lastSpace)}...`;
}

export function buildNarrationScript(
  articles: Article[],
  options: Pick<NarrationOptions, 'includeSummary' | 'phrases'>
): NarrationSegment[] {
  const phrases = options.phrases ?? DEFAULT_PHRASES;

  return articles.map((article, index) => {
    const prefix = index === 0 ? phrases.first : index === articles.length - 1 ? phrases.last : phrases.next;
    const feedName = cleanHtml(article.feedName);
    const title = truncateAtWord(cleanHtml(article.title), MAX_TTS_TITLE);

    let text = `${prefix}. ${feedName}. ${title}.`;
    if (options.includeSummary && article.summary) {
      text += ` ${phrases.summary}: ${truncateAtWord(article.summary, MAX_TTS_SUMMARY)}`;
    }

    return { article, chunks: splitText(text) };
  });
}

export async function narrate(articles: Article[], speaker: SpeechPort, options: NarrationOptions): Promise<number> {
  if (articles.length === 0) return 0;
  const sleep = options.sleep ?? defaultSleep;

  if (options.introMediaUrl && speaker.playMedia) {
    try {
      await speaker.playMedia(options.introMediaUrl);
      await sleep(options.pauseSeconds * 1000);
    } catch (error) {
      logger.error('[narration] Failed to play intro media', error);
    }
  }

  const segments = buildNarrationScript(articles, options);
  for (const segment of segments) {
    for (const chunk of segment.chunks) {
      await speaker.speak(chunk);
    }
    const spokenLength = segment.chunks.reduce((total, chunk) => total + chunk.length, 0);
    await sleep((options.pauseSeconds + spokenLength / SPEECH_RATE) * 1000);
  }

  if (options.closingPhrase) {
    try {
      await speaker.speak(options.closingPhrase);
    } catch (error) {
      logger.error('[narration] Failed to speak closing phrase', error);
    }
  }

  logger.info(`[narration] Narrated ${segments.length} articles`);
  return segments.length;
}
