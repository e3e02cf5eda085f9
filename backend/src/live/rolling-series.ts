/**
 * One stored observation.
 */
export interface SeriesEntry {
  timestamp: Date;
  value: number;
}

/**
 * Fixed-capacity FIFO of series entries.
 *
 * Backed by a ring buffer: appending to a full series overwrites the
 * oldest slot, so eviction is O(1) and insertion order is preserved.
 */
export class RollingSeries {
  private readonly slots: Array<SeriesEntry | undefined>;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Series capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.slots = new Array<SeriesEntry | undefined>(capacity);
  }

  get length(): number {
    return this.count;
  }

  /**
   * Append an entry, evicting the oldest one when full.
   *
   * @returns the evicted entry, if any
   */
  push(entry: SeriesEntry): SeriesEntry | undefined {
    const stored: SeriesEntry = {
      timestamp: new Date(entry.timestamp.getTime()),
      value: entry.value,
    };

    if (this.count < this.capacity) {
      this.slots[(this.start + this.count) % this.capacity] = stored;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.start];
    this.slots[this.start] = stored;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  /** Most recent entry (copy). */
  latest(): SeriesEntry | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.copyAt(this.count - 1);
  }

  /**
   * Entries oldest-first. Copies, so callers can't mutate the series.
   */
  toArray(): SeriesEntry[] {
    const entries: SeriesEntry[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.copyAt(i);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  private copyAt(offset: number): SeriesEntry | undefined {
    const entry = this.slots[(this.start + offset) % this.capacity];
    if (!entry) {
      return undefined;
    }
    return { timestamp: new Date(entry.timestamp.getTime()), value: entry.value };
  }
}
