import type { Scheduler } from './scheduler';

/**
 * Frames counted per elapsed wall-clock window. The rate is recomputed each time a
 * window of at least `windowMs` closes and reads 0 once no frame arrived for two windows.
 */
export class FrameRateMeter {
  private windowStart: number;
  private windowFrames = 0;
  private lastFrameAt?: number;
  private rate = 0;

  constructor(
    private readonly scheduler: Pick<Scheduler, 'now'>,
    private readonly windowMs = 1000,
  ) {
    this.windowStart = scheduler.now();
  }

  /** Count one frame; returns the new rate when this frame closed a window. */
  tick(): number | undefined {
    const now = this.scheduler.now();
    this.windowFrames += 1;
    this.lastFrameAt = now;

    const elapsed = now - this.windowStart;
    if (elapsed < this.windowMs) {
      return undefined;
    }
    this.rate = (this.windowFrames * 1000) / elapsed;
    this.windowFrames = 0;
    this.windowStart = now;
    return this.rate;
  }

  get framesPerSecond(): number {
    if (this.lastFrameAt === undefined) {
      return 0;
    }
    return this.scheduler.now() - this.lastFrameAt >= this.windowMs * 2 ? 0 : this.rate;
  }

  reset(): void {
    this.windowStart = this.scheduler.now();
    this.windowFrames = 0;
    this.lastFrameAt = undefined;
    this.rate = 0;
  }
}
