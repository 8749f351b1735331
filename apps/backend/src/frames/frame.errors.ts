import type { FrameFormat } from './frame-format';
import type { FrameDimensions } from './frame.types';

export class InsufficientDataError extends Error {
  readonly format: FrameFormat;
  readonly expected: number;
  readonly actual: number;

  constructor(format: FrameFormat, expected: number, actual: number) {
    super(`Expected ${expected} bytes for ${format}, got ${actual}`);
    this.name = 'InsufficientDataError';
    this.format = format;
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnrecognizedFormatError extends Error {
  readonly byteLength: number;
  readonly dimensions: FrameDimensions;

  constructor(byteLength: number, dimensions: FrameDimensions) {
    super(
      `No frame format matches ${byteLength} bytes at ${dimensions.width}x${dimensions.height}`,
    );
    this.name = 'UnrecognizedFormatError';
    this.byteLength = byteLength;
    this.dimensions = dimensions;
  }
}

export class InvalidDimensionsError extends Error {
  readonly format: FrameFormat;
  readonly dimensions: FrameDimensions;

  constructor(format: FrameFormat, dimensions: FrameDimensions, groupSize: number) {
    super(
      `${dimensions.width}x${dimensions.height} is not valid for ${format}: width must be a positive multiple of ${groupSize}`,
    );
    this.name = 'InvalidDimensionsError';
    this.format = format;
    this.dimensions = dimensions;
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}
