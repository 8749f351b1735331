/**
 * Raw sensor frame decoder
 * Turns the packed wire layouts of the catalog into a canonical pixel grid.
 */

import { detectFormat, DEFAULT_DETECTION_TOLERANCE } from './format-detector';
import { frameSize } from './frame-format';
import type { FrameFormat, SampleBitDepth } from './frame-format';
import { InsufficientDataError, UnrecognizedFormatError } from './frame.errors';
import type { BayerGrid, DecodeOptions, PixelGrid, RawFrame, RgbGrid } from './frame.types';

const DEFAULT_RAW8_BIT_DEPTH: SampleBitDepth = 10;

export interface AutoDecodeOptions extends DecodeOptions {
  toleranceBytes?: number;
  /** Used when detection fails; without it an UnrecognizedFormatError is thrown. */
  fallbackFormat?: FrameFormat;
}

export interface AutoDecodeResult {
  format: FrameFormat;
  /** True when nothing matched the byte count and `fallbackFormat` was used. */
  fellBack: boolean;
  grid: PixelGrid;
}

/**
 * Decode one frame. Trailing bytes past the format's frame size are ignored.
 */
export function decodeFrame(
  raw: RawFrame,
  format: FrameFormat,
  options: DecodeOptions = {},
): PixelGrid {
  const expected = frameSize(format, raw.dimensions);
  if (raw.bytes.length < expected) {
    throw new InsufficientDataError(format, expected, raw.bytes.length);
  }

  const bytes = raw.bytes.subarray(0, expected);
  const { width, height } = raw.dimensions;
  const pixelCount = width * height;

  switch (format) {
    case 'raw10-packed-5per4':
      return bayerGrid(width, height, 10, unpackRaw10FivePerFour(bytes, pixelCount));
    case 'raw-packed-12-msb':
      return bayerGrid(width, height, 12, unpackRaw12MsbFirst(bytes, pixelCount));
    case 'raw-packed-12-sbggr':
      return bayerGrid(width, height, 12, unpackRaw12Sbggr(bytes, pixelCount));
    case 'raw-packed-10':
      return bayerGrid(width, height, 10, unpackWords(bytes, pixelCount, (word) => word & 0x03ff));
    case 'raw-unpacked-12-lsb':
      return bayerGrid(width, height, 12, unpackWords(bytes, pixelCount, (word) => word & 0x0fff));
    case 'raw-unpacked-12-msb':
      return bayerGrid(width, height, 12, unpackWords(bytes, pixelCount, (word) => word >> 4));
    case 'raw8': {
      const depth = options.raw8BitDepth ?? DEFAULT_RAW8_BIT_DEPTH;
      return bayerGrid(width, height, depth, widenRaw8(bytes, depth - 8));
    }
    case 'rgb888':
      // Copy so the grid never aliases the transport buffer.
      return rgbGrid(width, height, 'bgr', new Uint8Array(bytes));
    case 'rgb565':
      return rgbGrid(width, height, 'rgb', unpackRgb565(bytes, pixelCount));
    default:
      return assertNever(format);
  }
}

/**
 * Decode using the frame's own format, else the first catalog entry whose size matches.
 */
export function decodeAuto(raw: RawFrame, options: AutoDecodeOptions = {}): AutoDecodeResult {
  if (raw.format) {
    return { format: raw.format, fellBack: false, grid: decodeFrame(raw, raw.format, options) };
  }

  const detected = detectFormat(
    raw.bytes.length,
    raw.dimensions,
    options.toleranceBytes ?? DEFAULT_DETECTION_TOLERANCE,
  );
  if (detected) {
    return { format: detected, fellBack: false, grid: decodeFrame(raw, detected, options) };
  }

  if (!options.fallbackFormat) {
    throw new UnrecognizedFormatError(raw.bytes.length, raw.dimensions);
  }
  return {
    format: options.fallbackFormat,
    fellBack: true,
    grid: decodeFrame(raw, options.fallbackFormat, options),
  };
}

export function maxSampleValue(grid: PixelGrid): number {
  return (1 << grid.bitDepth) - 1;
}

export function describeGridShape(grid: PixelGrid): number[] {
  return grid.kind === 'rgb' ? [grid.height, grid.width, 3] : [grid.height, grid.width];
}

/**
 * MIPI RAW10: bytes 0-3 carry P0..P3 bits [9:2], byte 4 carries bits [1:0] of each,
 * P0 in the lowest two bits.
 */
function unpackRaw10FivePerFour(bytes: Uint8Array, pixelCount: number): Uint16Array {
  const out = new Uint16Array(pixelCount);
  for (let px = 0, i = 0; px < pixelCount; px += 4, i += 5) {
    const low = bytes[i + 4];
    out[px] = (bytes[i] << 2) | (low & 0x03);
    out[px + 1] = (bytes[i + 1] << 2) | ((low >> 2) & 0x03);
    out[px + 2] = (bytes[i + 2] << 2) | ((low >> 4) & 0x03);
    out[px + 3] = (bytes[i + 3] << 2) | ((low >> 6) & 0x03);
  }
  return out;
}

// Byte 0: P0[11:4], byte 1: P1[11:4], byte 2: P1[3:0] | P0[3:0]
function unpackRaw12MsbFirst(bytes: Uint8Array, pixelCount: number): Uint16Array {
  const out = new Uint16Array(pixelCount);
  for (let px = 0, i = 0; px < pixelCount; px += 2, i += 3) {
    const shared = bytes[i + 2];
    out[px] = (bytes[i] << 4) | (shared & 0x0f);
    out[px + 1] = (bytes[i + 1] << 4) | ((shared >> 4) & 0x0f);
  }
  return out;
}

// Byte 0: P0[7:0], byte 1: P1[7:0], byte 2: P1[11:8] | P0[11:8]
function unpackRaw12Sbggr(bytes: Uint8Array, pixelCount: number): Uint16Array {
  const out = new Uint16Array(pixelCount);
  for (let px = 0, i = 0; px < pixelCount; px += 2, i += 3) {
    const shared = bytes[i + 2];
    out[px] = ((shared & 0x0f) << 8) | bytes[i];
    out[px + 1] = ((shared >> 4) << 8) | bytes[i + 1];
  }
  return out;
}

function unpackWords(
  bytes: Uint8Array,
  pixelCount: number,
  extract: (word: number) => number,
): Uint16Array {
  const out = new Uint16Array(pixelCount);
  for (let px = 0, i = 0; px < pixelCount; px++, i += 2) {
    out[px] = extract(bytes[i] | (bytes[i + 1] << 8));
  }
  return out;
}

function widenRaw8(bytes: Uint8Array, shift: number): Uint16Array {
  const out = new Uint16Array(bytes.length);
  for (let px = 0; px < bytes.length; px++) {
    out[px] = bytes[px] << shift;
  }
  return out;
}

function unpackRgb565(bytes: Uint8Array, pixelCount: number): Uint8Array {
  const out = new Uint8Array(pixelCount * 3);
  for (let px = 0, i = 0, o = 0; px < pixelCount; px++, i += 2, o += 3) {
    const word = bytes[i] | (bytes[i + 1] << 8);
    const r5 = (word >> 11) & 0x1f;
    const g6 = (word >> 5) & 0x3f;
    const b5 = word & 0x1f;
    out[o] = (r5 << 3) | (r5 >> 2);
    out[o + 1] = (g6 << 2) | (g6 >> 4);
    out[o + 2] = (b5 << 3) | (b5 >> 2);
  }
  return out;
}

function bayerGrid(
  width: number,
  height: number,
  bitDepth: SampleBitDepth,
  samples: Uint16Array,
): BayerGrid {
  return { kind: 'bayer', width, height, bitDepth, samples };
}

function rgbGrid(
  width: number,
  height: number,
  channelOrder: RgbGrid['channelOrder'],
  samples: Uint8Array,
): RgbGrid {
  return { kind: 'rgb', width, height, bitDepth: 8, channelOrder, samples };
}

function assertNever(format: never): never {
  throw new Error(`Unhandled frame format: ${String(format)}`);
}
