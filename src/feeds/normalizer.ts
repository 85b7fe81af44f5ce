import type { Article, MediaReference, RawFeedEntry } from '../types/article';
import { cleanHtml, extractImageFromHtml } from '../utils/html';
import { parsePublished } from '../utils/time';
import { DEFAULT_PLACEHOLDER_IMAGE_URL } from '../config/environment';

function firstUrl(references: MediaReference[] | undefined): string | undefined {
  const url = references?.[0]?.url?.trim();
  return url ? url : undefined;
}

/**
 * Image priority: enclosure, media:content, media:thumbnail, first <img> in the
 * entry HTML, placeholder.
 */
export function extractImage(entry: RawFeedEntry, placeholderImageUrl = DEFAULT_PLACEHOLDER_IMAGE_URL): string {
  return (
    firstUrl(entry.enclosures) ??
    firstUrl(entry.mediaContent) ??
    firstUrl(entry.mediaThumbnail) ??
    extractImageFromHtml(entry.description || entry.summary) ??
    placeholderImageUrl
  );
}

/**
 * Summary priority: first content block, summary, description. The chosen value is
 * cleaned of markup; an empty result counts as no summary.
 */
export function extractSummary(entry: RawFeedEntry): string | undefined {
  const source = entry.content?.[0]?.value || entry.summary || entry.description;
  if (!source) return undefined;
  const cleaned = cleanHtml(source);
  return cleaned || undefined;
}

export function normalizeEntry(
  entry: RawFeedEntry,
  feedName: string,
  placeholderImageUrl = DEFAULT_PLACEHOLDER_IMAGE_URL
): Article {
  const published = entry.published?.trim() || undefined;

  return {
    title: entry.title ?? '',
    link: entry.link ?? '',
    imageUrl: extractImage(entry, placeholderImageUrl),
    feedName,
    summary: extractSummary(entry),
    published,
    publishedAt: parsePublished(published)
  };
}
