/**
 * Set of presented article ids, bounded by insertion order: once full, the oldest
 * insertion is evicted. Re-adding an id does not refresh its position.
 */
export class SeenSet {
  private readonly ids = new Set<string>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`SeenSet capacity must be a positive integer, got ${capacity}`);
    }
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  add(id: string) {
    if (this.ids.has(id)) return;
    this.ids.add(id);
    if (this.ids.size > this.capacity) {
      // Sets iterate in insertion order
      const oldest = this.ids.values().next();
      if (!oldest.done) {
        this.ids.delete(oldest.value);
      }
    }
  }

  get size(): number {
    return this.ids.size;
  }
}
