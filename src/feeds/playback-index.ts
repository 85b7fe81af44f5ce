import type { Article } from '../types/article';

// Cursor into the current aggregation; wraps in both directions
export class PlaybackIndex {
  private position = 0;

  constructor(private readonly articles: () => Article[]) {}

  get value(): number {
    return this.position;
  }

  advance(): number {
    const length = this.articles().length;
    if (length > 0) {
      this.position = (this.position + 1) % length;
    }
    return this.position;
  }

  retreat(): number {
    const length = this.articles().length;
    if (length > 0) {
      this.position = (this.position - 1 + length) % length;
    }
    return this.position;
  }

  reset() {
    this.position = 0;
  }

  current(): Article | undefined {
    const articles = this.articles();
    if (articles.length === 0) return undefined;
    // The list may have shrunk since the cursor last moved
    return articles[this.position % articles.length];
  }
}
