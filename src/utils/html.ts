import * as cheerio from 'cheerio';
import { decode } from 'html-entities';

const TAG_PATTERN = /<[^<]+?>/g;

/**
 * Decode HTML entities, then strip tags with a plain pattern.
 * Escaped markup (&lt;b&gt;) is removed too; a lone decoded `<` or `>` stays.
 */
export function cleanHtml(text: string | undefined): string {
  if (!text) return '';
  return decode(text).replace(TAG_PATTERN, '').trim();
}

export function extractImageFromHtml(html: string | undefined): string | undefined {
  if (!html) return undefined;
  const $ = cheerio.load(html, null, false);
  const src = $('img[src]').first().attr('src')?.trim();
  return src ? src : undefined;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}
