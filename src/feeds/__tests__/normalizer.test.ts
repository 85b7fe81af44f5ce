import { extractImage, extractSummary, normalizeEntry } from '../normalizer';
import { DEFAULT_PLACEHOLDER_IMAGE_URL } from '../../config/environment';
import { createEntry } from '../../__tests__/setup';

describe('Entry normalizer', () => {
  describe('extractImage', () => {
    it('should prefer the enclosure over media fields', () => {
      const entry = createEntry({
        enclosures: [{ url: 'https://example.com/enclosure.jpg' }],
        mediaContent: [{ url: 'https://example.com/media.jpg' }],
        mediaThumbnail: [{ url: 'https://example.com/thumb.jpg' }]
      });
      expect(extractImage(entry)).toBe('https://example.com/enclosure.jpg');
    });

    it('should skip empty URLs and fall through to media content', () => {
      const entry = createEntry({
        enclosures: [{ url: '' }],
        mediaContent: [{ url: 'https://example.com/media.jpg' }]
      });
      expect(extractImage(entry)).toBe('https://example.com/media.jpg');
    });

    it('should use the thumbnail when no enclosure or media content exists', () => {
      const entry = createEntry({ mediaThumbnail: [{ url: 'https://example.com/thumb.jpg' }] });
      expect(extractImage(entry)).toBe('https://example.com/thumb.jpg');
    });

    it('should find an inline image in the description', () => {
      const entry = createEntry({
        description: '<p><img src="https://example.com/inline.jpg"> Body</p>',
        summary: '<img src="https://example.com/other.jpg">'
      });
      expect(extractImage(entry)).toBe('https://example.com/inline.jpg');
    });

    it('should fall back to the placeholder', () => {
      expect(extractImage(createEntry())).toBe(DEFAULT_PLACEHOLDER_IMAGE_URL);
      expect(extractImage(createEntry(), 'https://example.com/fallback.png')).toBe('https://example.com/fallback.png');
    });
  });

  describe('extractSummary', () => {
    it('should prefer the first content block', () => {
      const entry = createEntry({
        content: [{ value: '<p>Full &amp; body</p>' }, { value: 'second' }],
        summary: 'Summary',
        description: 'Description'
      });
      expect(extractSummary(entry)).toBe('Full & body');
    });

    it('should use the summary, then the description', () => {
      expect(extractSummary(createEntry({ summary: '<b>Short</b>', description: 'Long' }))).toBe('Short');
      expect(extractSummary(createEntry({ description: '<i>Only description</i>' }))).toBe('Only description');
    });

    it('should be absent when nothing usable exists', () => {
      expect(extractSummary(createEntry())).toBeUndefined();
      expect(extractSummary(createEntry({ summary: '<p> </p>' }))).toBeUndefined();
    });
  });

  describe('normalizeEntry', () => {
    it('should never throw on an empty entry', () => {
      expect(normalizeEntry({}, 'Empty Feed')).toEqual({
        title: '',
        link: '',
        imageUrl: DEFAULT_PLACEHOLDER_IMAGE_URL,
        feedName: 'Empty Feed',
        summary: undefined,
        published: undefined,
        publishedAt: undefined
      });
    });

    it('should keep the feed date string and parse its timestamp', () => {
      const article = normalizeEntry(
        createEntry({ title: 'Launch', published: 'Mon, 19 Oct 2026 14:05:00 +0200' }),
        'Science'
      );
      expect(article.title).toBe('Launch');
      expect(article.feedName).toBe('Science');
      expect(article.published).toBe('Mon, 19 Oct 2026 14:05:00 +0200');
      expect(article.publishedAt).toBe(Date.UTC(2026, 9, 19, 12, 5));
    });

    it('should leave the timestamp absent for malformed dates', () => {
      const article = normalizeEntry(createEntry({ published: 'yesterday-ish' }), 'Science');
      expect(article.published).toBe('yesterday-ish');
      expect(article.publishedAt).toBeUndefined();
    });
  });
});
