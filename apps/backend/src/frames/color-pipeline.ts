import { Injectable, Logger } from '@nestjs/common';

import { maxSampleValue } from './frame-decoder';
import type { FrameFormat } from './frame-format';
import type { PixelGrid } from './frame.types';

export const COLOR_PIPELINE = Symbol('COLOR_PIPELINE');

// Fraction of full scale above which a frame is reported as over-exposed (900 of 1023 at 10 bits).
const OVEREXPOSURE_RATIO = 0.88;

export interface GridSummary {
  min: number;
  max: number;
  mean: number;
  /** Full-scale value for the grid's bit depth. */
  fullScale: number;
  overexposed: boolean;
}

export interface DecodedFrame {
  sequence: number;
  format: FrameFormat;
  grid: PixelGrid;
  receivedAt: number;
}

/**
 * Downstream color reconstruction (demosaic, white balance, contrast, gamma).
 * Implementations receive every freshly decoded grid; they must not retain
 * `frame.grid.samples` past the call unless they copy it.
 */
export interface ColorPipeline {
  process(frame: DecodedFrame): void | Promise<void>;
}

export function summarizeGrid(grid: PixelGrid): GridSummary {
  const { samples } = grid;
  const fullScale = maxSampleValue(grid);
  if (samples.length === 0) {
    return { min: 0, max: 0, mean: 0, fullScale, overexposed: false };
  }

  let min = samples[0];
  let max = samples[0];
  let total = 0;
  for (const value of samples) {
    if (value < min) min = value;
    if (value > max) max = value;
    total += value;
  }

  return {
    min,
    max,
    mean: total / samples.length,
    fullScale,
    overexposed: max > fullScale * OVEREXPOSURE_RATIO,
  };
}

/** Default pipeline: logs sample statistics for the first frame of each format. */
@Injectable()
export class FrameStatsPipeline implements ColorPipeline {
  private readonly logger = new Logger(FrameStatsPipeline.name);
  private readonly reportedFormats = new Set<FrameFormat>();

  process(frame: DecodedFrame): void {
    if (this.reportedFormats.has(frame.format)) {
      return;
    }
    this.reportedFormats.add(frame.format);

    const summary = summarizeGrid(frame.grid);
    this.logger.log(
      `First ${frame.format} frame: min=${summary.min} max=${summary.max} mean=${summary.mean.toFixed(1)}`,
    );
    if (summary.overexposed) {
      this.logger.warn(
        `Frame looks over-exposed (max ${summary.max} of ${summary.fullScale}); lower the sensor exposure`,
      );
    }
  }
}
