import { InvalidDimensionsError } from './frame.errors';
import type { FrameDimensions } from './frame.types';

export const FRAME_FORMATS = [
  'raw-packed-10',
  'raw-packed-12-msb',
  'raw-packed-12-sbggr',
  'raw-unpacked-12-lsb',
  'raw-unpacked-12-msb',
  'raw10-packed-5per4',
  'raw8',
  'rgb888',
  'rgb565',
] as const;

export type FrameFormat = (typeof FRAME_FORMATS)[number];

export type FrameFormatSetting = FrameFormat | 'auto';

export type SampleBitDepth = 8 | 10 | 12;

export interface FrameFormatSpec {
  id: FrameFormat;
  label: string;
  /** `bayer` grids still need demosaicing; `rgb` grids come out of the sensor ISP. */
  kind: 'bayer' | 'rgb';
  bytesPerGroup: number;
  pixelsPerGroup: number;
  bitDepth: SampleBitDepth;
}

export const FORMAT_CATALOG: Readonly<Record<FrameFormat, FrameFormatSpec>> = {
  'raw-packed-10': {
    id: 'raw-packed-10',
    label: 'RAW10 in 16-bit little-endian container',
    kind: 'bayer',
    bytesPerGroup: 2,
    pixelsPerGroup: 1,
    bitDepth: 10,
  },
  'raw-packed-12-msb': {
    id: 'raw-packed-12-msb',
    label: 'RAW12 packed, MSB first (3 bytes / 2 px)',
    kind: 'bayer',
    bytesPerGroup: 3,
    pixelsPerGroup: 2,
    bitDepth: 12,
  },
  'raw-packed-12-sbggr': {
    id: 'raw-packed-12-sbggr',
    label: 'RAW12 packed, MIPI little-endian / SBGGR12 (3 bytes / 2 px)',
    kind: 'bayer',
    bytesPerGroup: 3,
    pixelsPerGroup: 2,
    bitDepth: 12,
  },
  'raw-unpacked-12-lsb': {
    id: 'raw-unpacked-12-lsb',
    label: 'RAW12 unpacked, LSB aligned 16-bit words',
    kind: 'bayer',
    bytesPerGroup: 2,
    pixelsPerGroup: 1,
    bitDepth: 12,
  },
  'raw-unpacked-12-msb': {
    id: 'raw-unpacked-12-msb',
    label: 'RAW12 unpacked, MSB aligned 16-bit words',
    kind: 'bayer',
    bytesPerGroup: 2,
    pixelsPerGroup: 1,
    bitDepth: 12,
  },
  'raw10-packed-5per4': {
    id: 'raw10-packed-5per4',
    label: 'MIPI RAW10 packed (5 bytes / 4 px)',
    kind: 'bayer',
    bytesPerGroup: 5,
    pixelsPerGroup: 4,
    bitDepth: 10,
  },
  raw8: {
    id: 'raw8',
    label: 'RAW8 Bayer (1 byte / px)',
    kind: 'bayer',
    bytesPerGroup: 1,
    pixelsPerGroup: 1,
    bitDepth: 8,
  },
  rgb888: {
    id: 'rgb888',
    label: 'RGB888 from the ISP, BGR byte order (3 bytes / px)',
    kind: 'rgb',
    bytesPerGroup: 3,
    pixelsPerGroup: 1,
    bitDepth: 8,
  },
  rgb565: {
    id: 'rgb565',
    label: 'RGB565 from the ISP (2 bytes / px)',
    kind: 'rgb',
    bytesPerGroup: 2,
    pixelsPerGroup: 1,
    bitDepth: 8,
  },
};

// Pre-demosaiced output is what the device streams by default, so it is tried first.
export const FORMAT_DETECTION_ORDER: readonly FrameFormat[] = [
  'rgb888',
  'rgb565',
  'raw8',
  'raw10-packed-5per4',
  'raw-packed-12-msb',
  'raw-packed-12-sbggr',
  'raw-packed-10',
  'raw-unpacked-12-lsb',
  'raw-unpacked-12-msb',
];

export function isFrameFormat(value: unknown): value is FrameFormat {
  return FRAME_FORMATS.some((format) => format === value);
}

export function isDimensionCompatible(format: FrameFormat, dimensions: FrameDimensions): boolean {
  const { width, height } = dimensions;
  return (
    Number.isInteger(width) &&
    Number.isInteger(height) &&
    width > 0 &&
    height > 0 &&
    width % FORMAT_CATALOG[format].pixelsPerGroup === 0
  );
}

export function assertDimensions(format: FrameFormat, dimensions: FrameDimensions): void {
  if (!isDimensionCompatible(format, dimensions)) {
    throw new InvalidDimensionsError(format, dimensions, FORMAT_CATALOG[format].pixelsPerGroup);
  }
}

/**
 * Exact byte count of one frame of `format` at `dimensions`.
 * Throws InvalidDimensionsError when the width does not fit the format's pixel groups.
 */
export function frameSize(format: FrameFormat, dimensions: FrameDimensions): number {
  assertDimensions(format, dimensions);
  const layout = FORMAT_CATALOG[format];
  return ((dimensions.width * dimensions.height) / layout.pixelsPerGroup) * layout.bytesPerGroup;
}

/** Largest frame any catalog format produces at `dimensions`; sizes the framer's buffer ceiling. */
export function largestFrameSize(dimensions: FrameDimensions): number {
  return FRAME_FORMATS.filter((format) => isDimensionCompatible(format, dimensions)).reduce(
    (largest, format) => Math.max(largest, frameSize(format, dimensions)),
    0,
  );
}
