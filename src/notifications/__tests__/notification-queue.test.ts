import { articleId } from '../article-id';
import { SeenSet } from '../seen-set';
import { DedupState, NotificationQueue, newCountsByFeed } from '../notification-queue';
import { createArticle } from '../../__tests__/setup';

describe('articleId', () => {
  it('should hash title and feed name with MD5', () => {
    expect(articleId({ title: 'a', feedName: 'b' })).toBe('187ef4436122d1cc2f40dc2b92f0eba0');
  });

  it('should ignore every other field', () => {
    const first = createArticle({ title: 'Same', feedName: 'Feed', link: 'https://example.com/1', summary: 'x' });
    const second = createArticle({ title: 'Same', feedName: 'Feed', link: 'https://example.com/2', published: undefined });
    expect(articleId(first)).toBe(articleId(second));
  });

  it('should differ when title or feed differ', () => {
    const base = articleId({ title: 'Title', feedName: 'Feed' });
    expect(articleId({ title: 'Title', feedName: 'Other' })).not.toBe(base);
    expect(articleId({ title: 'Other', feedName: 'Feed' })).not.toBe(base);
    expect(base).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe('SeenSet', () => {
  it('should evict the oldest insertion when full', () => {
    const seen = new SeenSet(2);
    seen.add('a');
    seen.add('b');
    seen.add('a');
    seen.add('c');

    expect(seen.size).toBe(2);
    expect(seen.has('a')).toBe(false);
    expect(seen.has('b')).toBe(true);
    expect(seen.has('c')).toBe(true);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new SeenSet(0)).toThrow('SeenSet capacity must be a positive integer, got 0');
  });
});

describe('NotificationQueue', () => {
  it('should serve in FIFO order', () => {
    const queue = new NotificationQueue(3);
    queue.enqueue(createArticle({ title: 'first' }));
    queue.enqueue(createArticle({ title: 'second' }));

    expect(queue.shift()?.article.title).toBe('first');
    expect(queue.peek()?.article.title).toBe('second');
    expect(queue.size).toBe(1);
  });

  it('should leave a full queue untouched', () => {
    const queue = new NotificationQueue(2);
    queue.enqueue(createArticle({ title: 'first' }));
    queue.enqueue(createArticle({ title: 'second' }));
    const before = queue.ids();

    expect(queue.enqueue(createArticle({ title: 'third' }))).toBe(false);
    expect(queue.isFull).toBe(true);
    expect(queue.ids()).toEqual(before);
  });

  it('should not queue the same article twice', () => {
    const queue = new NotificationQueue(5);
    expect(queue.enqueue(createArticle({ title: 'dup', summary: 'one' }))).toBe(true);
    expect(queue.enqueue(createArticle({ title: 'dup', summary: 'two' }))).toBe(false);
    expect(queue.size).toBe(1);
    expect(queue.has(articleId({ title: 'dup', feedName: 'Test Feed' }))).toBe(true);
  });
});

describe('DedupState', () => {
  const at = (hour: number) => `2026-10-19T${String(hour).padStart(2, '0')}:00:00Z`;

  it('should treat any dated unseen article as novel before the first presentation', () => {
    const dedup = new DedupState({ maxQueueSize: 10, seenCapacity: 100 });
    expect(dedup.isNovel(createArticle({ published: at(1) }))).toBe(true);
    expect(dedup.isNovel(createArticle({ published: undefined }))).toBe(false);
  });

  it('should only treat articles newer than the high-water mark as novel', () => {
    const dedup = new DedupState({ maxQueueSize: 10, seenCapacity: 100 });
    dedup.markPresented(createArticle({ title: 'shown', published: at(12) }), 0);

    expect(dedup.isNovel(createArticle({ title: 'older', published: at(11) }))).toBe(false);
    expect(dedup.isNovel(createArticle({ title: 'same time', published: at(12) }))).toBe(false);
    expect(dedup.isNovel(createArticle({ title: 'newer', published: at(13) }))).toBe(true);
    expect(dedup.isNovel(createArticle({ title: 'shown', published: at(14) }))).toBe(false);
  });

  it('should enqueue novel articles oldest first', () => {
    const dedup = new DedupState({ maxQueueSize: 10, seenCapacity: 100 });
    dedup.markPresented(createArticle({ title: 'shown', published: at(10) }), 0);

    const added = dedup.enqueueNovel([
      createArticle({ title: 'newest', published: at(14) }),
      createArticle({ title: 'middle', published: at(12) }),
      createArticle({ title: 'undated', published: undefined }),
      createArticle({ title: 'stale', published: at(9) }),
      createArticle({ title: 'shown', published: at(10) })
    ]);

    expect(added).toBe(2);
    expect(dedup.queue.ids()).toEqual([
      articleId({ title: 'middle', feedName: 'Test Feed' }),
      articleId({ title: 'newest', feedName: 'Test Feed' })
    ]);
  });

  it('should drop candidates beyond capacity and keep the oldest ones', () => {
    const dedup = new DedupState({ maxQueueSize: 2, seenCapacity: 100 });
    const added = dedup.enqueueNovel([at(3), at(2), at(1)].map((published, i) => createArticle({ title: `t${i}`, published })));

    expect(added).toBe(2);
    expect(dedup.queue.ids()).toEqual([
      articleId({ title: 't2', feedName: 'Test Feed' }),
      articleId({ title: 't1', feedName: 'Test Feed' })
    ]);
  });

  it('should never lower the high-water mark', () => {
    const dedup = new DedupState({ maxQueueSize: 10, seenCapacity: 100 });
    dedup.markPresented(createArticle({ title: 'late', published: at(15) }), 0);
    dedup.markPresented(createArticle({ title: 'early', published: at(9) }), 0);

    expect(dedup.highWaterMark).toBe(Date.parse(at(15)));
  });

  it('should use the current time for undated articles', () => {
    const dedup = new DedupState({ maxQueueSize: 10, seenCapacity: 100 });
    dedup.markPresented(createArticle({ published: undefined }), 1234);

    expect(dedup.highWaterMark).toBe(1234);
    expect(dedup.seen.size).toBe(1);
  });

  it('should list the unseen articles in order', () => {
    const dedup = new DedupState({ maxQueueSize: 10, seenCapacity: 100 });
    const articles = ['a', 'b', 'c'].map(title => createArticle({ title }));
    dedup.markPresented(articles[1], 0);

    expect(dedup.unseen(articles).map(article => article.title)).toEqual(['a', 'c']);
  });
});

describe('newCountsByFeed', () => {
  it('should count new articles per feed', () => {
    const previous = [createArticle({ title: 'old', feedName: 'Politics' })];
    const current = [
      createArticle({ title: 'fresh 1', feedName: 'Science' }),
      createArticle({ title: 'old', feedName: 'Politics' }),
      createArticle({ title: 'fresh 2', feedName: 'Politics' }),
      createArticle({ title: 'fresh 3', feedName: 'Science' })
    ];

    expect([...newCountsByFeed(current, previous).entries()]).toEqual([
      ['Science', 2],
      ['Politics', 1]
    ]);
  });

  it('should be empty when nothing changed', () => {
    const articles = [createArticle({ title: 'same' })];
    expect(newCountsByFeed(articles, articles).size).toBe(0);
  });
});
