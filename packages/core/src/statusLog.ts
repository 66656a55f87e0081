export const DEFAULT_STATUS_LIMIT = 20;

/** Fixed-capacity message log; the oldest message is evicted first once full. */
export class StatusLog {
  private readonly capacity: number;
  private readonly entries: string[] = [];

  constructor(capacity = DEFAULT_STATUS_LIMIT) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('Status log capacity must be a positive integer');
    }
    this.capacity = capacity;
  }

  push(message: string): void {
    if (this.entries.length === this.capacity) {
      this.entries.shift();
    }
    this.entries.push(message);
  }

  /** Oldest first. */
  messages(): string[] {
    return [...this.entries];
  }

  newestFirst(): string[] {
    return [...this.entries].reverse();
  }

  latest(): string | undefined {
    return this.entries[this.entries.length - 1];
  }

  get size(): number {
    return this.entries.length;
  }

  get limit(): number {
    return this.capacity;
  }
}
