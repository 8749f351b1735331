import {
  assertDimensions,
  FORMAT_DETECTION_ORDER,
  frameSize,
  isDimensionCompatible,
} from './frame-format';
import type { FrameFormat } from './frame-format';
import type { FrameDimensions } from './frame.types';

/** Slack for trailer and padding bytes some transports append after the payload. */
export const DEFAULT_DETECTION_TOLERANCE = 1000;

/**
 * First candidate whose exact frame size lies within `tolerance` bytes of `byteLength`.
 * Candidates whose pixel grouping does not fit `dimensions` are skipped.
 */
export function detectFormat(
  byteLength: number,
  dimensions: FrameDimensions,
  tolerance = DEFAULT_DETECTION_TOLERANCE,
  candidates: readonly FrameFormat[] = FORMAT_DETECTION_ORDER,
): FrameFormat | undefined {
  for (const format of candidates) {
    if (!isDimensionCompatible(format, dimensions)) {
      continue;
    }
    if (Math.abs(frameSize(format, dimensions) - byteLength) <= tolerance) {
      return format;
    }
  }
  return undefined;
}

/**
 * Session-scoped detector: the first successful detection is pinned and reused for
 * every following frame until reset, so a truncated frame cannot flip the format.
 */
export class FormatDetector {
  private pinnedFormat?: FrameFormat;

  constructor(
    private readonly dimensions: FrameDimensions,
    private readonly tolerance = DEFAULT_DETECTION_TOLERANCE,
    private readonly candidates: readonly FrameFormat[] = FORMAT_DETECTION_ORDER,
  ) {}

  get pinned(): FrameFormat | undefined {
    return this.pinnedFormat;
  }

  resolve(byteLength: number): FrameFormat | undefined {
    if (this.pinnedFormat) {
      return this.pinnedFormat;
    }
    const detected = detectFormat(byteLength, this.dimensions, this.tolerance, this.candidates);
    if (detected) {
      this.pinnedFormat = detected;
    }
    return detected;
  }

  pin(format: FrameFormat): void {
    assertDimensions(format, this.dimensions);
    this.pinnedFormat = format;
  }

  reset(): void {
    this.pinnedFormat = undefined;
  }
}
