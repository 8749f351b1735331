import type { FrameFormat, SampleBitDepth } from './frame-format';

export interface FrameDimensions {
  width: number;
  height: number;
}

export interface RawFrame {
  readonly bytes: Uint8Array;
  readonly dimensions: FrameDimensions;
  readonly format?: FrameFormat;
  /** Monotonic per source; 0 for frames loaded from disk. */
  readonly sequence: number;
  readonly receivedAt: number;
}

export interface BayerGrid {
  kind: 'bayer';
  width: number;
  height: number;
  bitDepth: SampleBitDepth;
  /** Row-major, `height * width` samples in `0 .. 2^bitDepth - 1`. */
  samples: Uint16Array;
}

export interface RgbGrid {
  kind: 'rgb';
  width: number;
  height: number;
  bitDepth: 8;
  channelOrder: 'rgb' | 'bgr';
  /** Row-major, `height * width * 3` interleaved channel samples. */
  samples: Uint8Array;
}

export type PixelGrid = BayerGrid | RgbGrid;

export interface DecodeOptions {
  /** Depth RAW8 samples are widened to so downstream math sees one range. */
  raw8BitDepth?: SampleBitDepth;
}
