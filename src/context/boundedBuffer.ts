/** FIFO that keeps only the newest `capacity` items. */
export class BoundedBuffer<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {}

  push(...values: T[]): void {
    if (this.capacity <= 0) {
      return;
    }
    this.items.push(...values);
    if (this.items.length > this.capacity) {
      this.items = this.items.slice(this.items.length - this.capacity);
    }
  }

  /** Replaces the newest item matching `predicate`. Returns false when none matches. */
  replaceLast(predicate: (item: T) => boolean, value: T): boolean {
    for (let index = this.items.length - 1; index >= 0; index -= 1) {
      if (predicate(this.items[index])) {
        this.items[index] = value;
        return true;
      }
    }
    return false;
  }

  toArray(): T[] {
    return [...this.items];
  }

  get length(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
