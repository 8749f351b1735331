export type PullResult<T> = { fresh: true; item: T } | { fresh: false };

/**
 * Single-slot hand-off between the ingestion loop and the consumer.
 *
 * A push over an undelivered item replaces it and counts it as dropped; a pull never
 * waits and only ever sees the newest item. This is not a FIFO: skipped items are gone.
 */
export class LatestFrameQueue<T> {
  private slot: { item: T } | undefined;
  private pushedCount = 0;
  private droppedCount = 0;
  private deliveredCount = 0;

  /** Returns true when an undelivered item was overwritten. */
  push(item: T): boolean {
    const overwrote = this.slot !== undefined;
    if (overwrote) {
      this.droppedCount += 1;
    }
    this.slot = { item };
    this.pushedCount += 1;
    return overwrote;
  }

  pullLatest(): PullResult<T> {
    const slot = this.slot;
    if (!slot) {
      return { fresh: false };
    }
    this.slot = undefined;
    this.deliveredCount += 1;
    return { fresh: true, item: slot.item };
  }

  /** Discard a pending item, counting it as dropped. */
  clear(): void {
    if (this.slot) {
      this.droppedCount += 1;
    }
    this.slot = undefined;
  }

  get pending(): boolean {
    return this.slot !== undefined;
  }

  get pushed(): number {
    return this.pushedCount;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get delivered(): number {
    return this.deliveredCount;
  }
}
