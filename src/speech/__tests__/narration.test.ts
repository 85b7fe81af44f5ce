/**
 * Tests for narration script building and playback
 */

import { buildNarrationScript, narrate, splitText, truncateAtWord, type SpeechPort } from '../narration';
import { createArticle } from '../../__tests__/setup';

describe('splitText', () => {
  it('should split on word boundaries', () => {
    expect(splitText('aaa bbb ccc', 7)).toEqual(['aaa', 'bbb ccc']);
  });

  it('should keep a single long word whole', () => {
    expect(splitText('abcdefghij', 4)).toEqual(['abcdefghij']);
  });

  it('should return no chunks for blank text', () => {
    expect(splitText('   ')).toEqual([]);
  });
});

describe('truncateAtWord', () => {
  it('should cut at the last whole word', () => {
    expect(truncateAtWord('hello world again', 12)).toBe('hello world...');
  });

  it('should leave short text alone', () => {
    expect(truncateAtWord('short', 12)).toBe('short');
  });
});

describe('buildNarrationScript', () => {
  const articles = [
    createArticle({ title: 'Alpha' }),
    createArticle({ title: '<b>Beta</b> news' }),
    createArticle({ title: 'Gamma', summary: 'Short summary' })
  ];

  it('should announce the position of each article', () => {
    const script = buildNarrationScript(articles, { includeSummary: false });

    expect(script.map(segment => segment.chunks)).toEqual([
      ['First item. Test Feed. Alpha.'],
      ['Next item. Test Feed. Beta news.'],
      ['Last item. Test Feed. Gamma.']
    ]);
  });

  it('should append summaries when included', () => {
    const script = buildNarrationScript(articles.slice(2), { includeSummary: true });

    expect(script[0].chunks).toEqual(['First item. Test Feed. Gamma. Summary: Short summary']);
  });

  it('should use custom phrases', () => {
    const script = buildNarrationScript(articles.slice(0, 1), {
      includeSummary: false,
      phrases: { first: 'Erstens', next: 'Weiter', last: 'Zuletzt', summary: 'Kurz' }
    });

    expect(script[0].chunks).toEqual(['Erstens. Test Feed. Alpha.']);
  });
});

describe('narrate', () => {
  let spoken: string[];
  let speaker: SpeechPort & { speak: jest.Mock; playMedia: jest.Mock };
  let sleep: jest.Mock;

  beforeEach(() => {
    spoken = [];
    speaker = {
      speak: jest.fn(async (message: string) => {
        spoken.push(message);
      }),
      playMedia: jest.fn(async () => undefined)
    };
    sleep = jest.fn(async () => undefined);
  });

  it('should speak every article and wait for it to finish', async () => {
    const count = await narrate([createArticle({ title: 'Update' })], speaker, {
      includeSummary: false,
      pauseSeconds: 2,
      sleep
    });

    expect(count).toBe(1);
    expect(spoken).toEqual(['First item. Test Feed. Update.']);
    // 30 characters at 15 per second, plus the pause
    expect(sleep).toHaveBeenCalledWith(4000);
  });

  it('should play the intro and speak the closing phrase', async () => {
    await narrate([createArticle({ title: 'Update' })], speaker, {
      includeSummary: false,
      pauseSeconds: 2,
      introMediaUrl: 'https://example.com/intro.mp3',
      closingPhrase: 'That is all',
      sleep
    });

    expect(speaker.playMedia).toHaveBeenCalledWith('https://example.com/intro.mp3');
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    expect(spoken).toEqual(['First item. Test Feed. Update.', 'That is all']);
  });

  it('should keep going when the intro or closing phrase fails', async () => {
    speaker.playMedia.mockRejectedValueOnce(new Error('no media player'));
    speaker.speak.mockImplementation(async (message: string) => {
      if (message === 'Goodbye') throw new Error('speech failed');
      spoken.push(message);
    });

    const count = await narrate([createArticle({ title: 'Update' })], speaker, {
      includeSummary: false,
      pauseSeconds: 2,
      introMediaUrl: 'https://example.com/intro.mp3',
      closingPhrase: 'Goodbye',
      sleep
    });

    expect(count).toBe(1);
    expect(spoken).toEqual(['First item. Test Feed. Update.']);
    expect(sleep.mock.calls).toEqual([[4000]]);
    expect(console.error).toHaveBeenCalledTimes(2);
  });

  it('should do nothing without articles', async () => {
    await expect(narrate([], speaker, { includeSummary: false, pauseSeconds: 2, sleep })).resolves.toBe(0);
    expect(speaker.speak).not.toHaveBeenCalled();
  });
});
