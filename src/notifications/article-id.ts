import CryptoJS from 'crypto-js';
import type { Article } from '../types/article';

/**
 * Content-addressed article identity: MD5 of title + feed name.
 * Feeds do not carry a reliable GUID, so two entries with the same title in the same
 * feed are the same article. Every dedup check must go through this function.
 */
export function articleId(article: Pick<Article, 'title' | 'feedName'>): string {
  return CryptoJS.MD5(`${article.title}${article.feedName}`).toString();
}
