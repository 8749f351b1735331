/**
 * Tests for the raw frame decoders
 */

import { fc, test } from '@fast-check/vitest';
import { describe, expect, it } from 'vitest';

import { decodeAuto, decodeFrame, describeGridShape } from '../frames/frame-decoder';
import type { FrameFormat } from '../frames/frame-format';
import {
  InsufficientDataError,
  InvalidDimensionsError,
  UnrecognizedFormatError,
} from '../frames/frame.errors';
import type { PixelGrid, RawFrame } from '../frames/frame.types';
import {
  packRaw10FivePerFour,
  packRaw12MsbFirst,
  packRaw12Sbggr,
  packWordsLe,
  patternBytes,
  rgb565Word,
} from './helpers';

function rawFrame(bytes: Uint8Array, width: number, height: number, format?: FrameFormat): RawFrame {
  return { bytes, dimensions: { width, height }, format, sequence: 1, receivedAt: 0 };
}

function bayerSamples(grid: PixelGrid): number[] {
  if (grid.kind !== 'bayer') {
    throw new Error(`expected a bayer grid, got ${grid.kind}`);
  }
  return Array.from(grid.samples);
}

function rgbSamples(grid: PixelGrid): number[] {
  if (grid.kind !== 'rgb') {
    throw new Error(`expected an rgb grid, got ${grid.kind}`);
  }
  return Array.from(grid.samples);
}

/** Frames whose width is a multiple of `group`, with samples below `2^bits`. */
function packedFrameArbitrary(group: number, bits: number) {
  return fc
    .record({
      groups: fc.integer({ min: 1, max: 12 }),
      height: fc.integer({ min: 1, max: 4 }),
    })
    .chain(({ groups, height }) => {
      const width = groups * group;
      const count = width * height;
      return fc
        .array(fc.integer({ min: 0, max: (1 << bits) - 1 }), { minLength: count, maxLength: count })
        .map((samples) => ({ width, height, samples }));
    });
}

describe('decodeFrame', () => {
  describe('raw10-packed-5per4', () => {
    it('spreads the shared fifth byte over four pixels', () => {
      const bytes = new Uint8Array([0xff, 0x00, 0x80, 0x01, 0b11100100]);
      const grid = decodeFrame(rawFrame(bytes, 4, 1), 'raw10-packed-5per4');

      expect(grid.kind).toBe('bayer');
      expect(grid.bitDepth).toBe(10);
      expect(bayerSamples(grid)).toEqual([1020, 1, 514, 7]);
    });

    test.prop([packedFrameArbitrary(4, 10)])('recovers every packed sample', ({ width, height, samples }) => {
      const grid = decodeFrame(
        rawFrame(packRaw10FivePerFour(samples), width, height),
        'raw10-packed-5per4',
      );
      expect(bayerSamples(grid)).toEqual(samples);
      expect(describeGridShape(grid)).toEqual([height, width]);
    });

    it('rejects widths that split a pixel group', () => {
      expect(() => decodeFrame(rawFrame(new Uint8Array(100), 6, 2), 'raw10-packed-5per4')).toThrow(
        InvalidDimensionsError,
      );
    });
  });

  describe('12-bit packed layouts', () => {
    it('reads MSB-first pairs', () => {
      const grid = decodeFrame(
        rawFrame(new Uint8Array([0xab, 0xcd, 0x21]), 2, 1),
        'raw-packed-12-msb',
      );
      expect(bayerSamples(grid)).toEqual([0xab1, 0xcd2]);
    });

    it('reads SBGGR pairs', () => {
      const grid = decodeFrame(
        rawFrame(new Uint8Array([0xab, 0xcd, 0x21]), 2, 1),
        'raw-packed-12-sbggr',
      );
      expect(bayerSamples(grid)).toEqual([0x1ab, 0x2cd]);
    });

    test.prop([packedFrameArbitrary(2, 12)])('round-trips MSB-first frames', ({ width, height, samples }) => {
      const grid = decodeFrame(rawFrame(packRaw12MsbFirst(samples), width, height), 'raw-packed-12-msb');
      expect(bayerSamples(grid)).toEqual(samples);
    });

    test.prop([packedFrameArbitrary(2, 12)])('round-trips SBGGR frames', ({ width, height, samples }) => {
      const grid = decodeFrame(rawFrame(packRaw12Sbggr(samples), width, height), 'raw-packed-12-sbggr');
      expect(bayerSamples(grid)).toEqual(samples);
    });
  });

  describe('word-per-pixel layouts', () => {
    const bytes = packWordsLe([0xf123, 0xabc0, 0xffff]);

    it('masks the low 12 bits for raw-unpacked-12-lsb', () => {
      expect(bayerSamples(decodeFrame(rawFrame(bytes, 3, 1), 'raw-unpacked-12-lsb'))).toEqual([
        0x123, 0xbc0, 0xfff,
      ]);
    });

    it('shifts out the padding nibble for raw-unpacked-12-msb', () => {
      expect(bayerSamples(decodeFrame(rawFrame(bytes, 3, 1), 'raw-unpacked-12-msb'))).toEqual([
        0xf12, 0xabc, 0xfff,
      ]);
    });

    it('masks the low 10 bits for raw-packed-10', () => {
      const grid = decodeFrame(rawFrame(bytes, 3, 1), 'raw-packed-10');
      expect(grid.bitDepth).toBe(10);
      expect(bayerSamples(grid)).toEqual([0x123, 0x3c0, 0x3ff]);
    });
  });

  describe('raw8', () => {
    it('widens to the 10-bit working depth by default', () => {
      const grid = decodeFrame(rawFrame(new Uint8Array([0, 1, 128, 255]), 4, 1), 'raw8');
      expect(grid.bitDepth).toBe(10);
      expect(bayerSamples(grid)).toEqual([0, 4, 512, 1020]);
    });

    it('keeps 8-bit samples when asked to', () => {
      const grid = decodeFrame(rawFrame(new Uint8Array([0, 1, 128, 255]), 4, 1), 'raw8', {
        raw8BitDepth: 8,
      });
      expect(grid.bitDepth).toBe(8);
      expect(bayerSamples(grid)).toEqual([0, 1, 128, 255]);
    });
  });

  describe('rgb888', () => {
    it('copies the BGR bytes without aliasing the input', () => {
      const bytes = new Uint8Array([10, 20, 30, 40, 50, 60]);
      const grid = decodeFrame(rawFrame(bytes, 2, 1), 'rgb888');
      bytes[0] = 99;

      expect(grid).toMatchObject({ kind: 'rgb', bitDepth: 8, channelOrder: 'bgr' });
      expect(rgbSamples(grid)).toEqual([10, 20, 30, 40, 50, 60]);
      expect(describeGridShape(grid)).toEqual([1, 2, 3]);
    });
  });

  describe('rgb565', () => {
    it('maps full-scale words to 255', () => {
      const grid = decodeFrame(rawFrame(packWordsLe([0xffff, 0x0000]), 2, 1), 'rgb565');
      expect(rgbSamples(grid)).toEqual([255, 255, 255, 0, 0, 0]);
    });

    test.prop([
      fc.integer({ min: 0, max: 255 }),
      fc.integer({ min: 0, max: 255 }),
      fc.integer({ min: 0, max: 255 }),
    ])('stays within the quantization step of the source colour', (r, g, b) => {
      const grid = decodeFrame(rawFrame(packWordsLe([rgb565Word(r, g, b)]), 1, 1), 'rgb565');
      const [outR, outG, outB] = rgbSamples(grid);

      expect(Math.abs(outR - r)).toBeLessThanOrEqual(7);
      expect(Math.abs(outG - g)).toBeLessThanOrEqual(3);
      expect(Math.abs(outB - b)).toBeLessThanOrEqual(7);
    });
  });

  it('throws InsufficientDataError with both sizes', () => {
    let caught: unknown;
    try {
      decodeFrame(rawFrame(new Uint8Array(4), 4, 1), 'raw10-packed-5per4');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InsufficientDataError);
    expect(caught).toMatchObject({ expected: 5, actual: 4 });
  });

  it('ignores trailing bytes past the frame size', () => {
    const bytes = new Uint8Array([0xff, 0x00, 0x80, 0x01, 0b11100100, 0x0d, 0x0a]);
    expect(bayerSamples(decodeFrame(rawFrame(bytes, 4, 1), 'raw10-packed-5per4'))).toEqual([
      1020, 1, 514, 7,
    ]);
  });
});

describe('decodeAuto', () => {
  it('prefers the format carried by the frame', () => {
    const result = decodeAuto(rawFrame(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]), 4, 1, 'raw8'));
    expect(result.format).toBe('raw8');
    expect(result.fellBack).toBe(false);
  });

  it('detects the format from the byte count', () => {
    const result = decodeAuto(rawFrame(new Uint8Array(5), 4, 1), { toleranceBytes: 0 });
    expect(result.format).toBe('raw10-packed-5per4');
    expect(result.fellBack).toBe(false);
  });

  it('falls back to the default format when nothing matches', () => {
    const result = decodeAuto(rawFrame(new Uint8Array(7), 4, 1), {
      toleranceBytes: 0,
      fallbackFormat: 'raw8',
    });
    expect(result.format).toBe('raw8');
    expect(result.fellBack).toBe(true);
  });

  it('throws UnrecognizedFormatError without a fallback', () => {
    expect(() => decodeAuto(rawFrame(new Uint8Array(7), 4, 1), { toleranceBytes: 0 })).toThrow(
      UnrecognizedFormatError,
    );
  });

  it('decodes a full-resolution RAW10 stream frame', () => {
    const width = 1936;
    const height = 1100;
    // Two trailing bytes, as the multipart framer leaves them.
    const bytes = patternBytes(2_662_000 + 2);

    const result = decodeAuto(rawFrame(bytes, width, height));
    const samples = bayerSamples(result.grid);

    expect(result.format).toBe('raw10-packed-5per4');
    expect(describeGridShape(result.grid)).toEqual([1100, 1936]);
    expect(samples).toHaveLength(2_129_600);
    expect(samples.slice(0, 2)).toEqual([0, 31]);
    expect(samples.every((value) => value >= 0 && value <= 1023)).toBe(true);
  });
});
