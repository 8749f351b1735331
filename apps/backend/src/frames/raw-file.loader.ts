import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, isAbsolute, join, relative, resolve } from 'node:path';

import type { FrameFormat } from './frame-format';
import type { FrameDimensions, RawFrame } from './frame.types';

const FILE_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export class CapturePathError extends Error {
  constructor(fileName: string) {
    super(`"${fileName}" is not a file inside the capture directory`);
    this.name = 'CapturePathError';
  }
}

/**
 * Resolve `fileName` inside `captureDir`. Only bare file names are accepted.
 */
export function resolveCaptureFile(captureDir: string, fileName: string): string {
  if (!FILE_NAME_PATTERN.test(fileName) || fileName === '.' || fileName === '..') {
    throw new CapturePathError(fileName);
  }
  const root = resolve(captureDir);
  const target = resolve(root, fileName);
  const rel = relative(root, target);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    throw new CapturePathError(fileName);
  }
  return target;
}

/** Header-less raw file; dimensions and format come from the caller. */
export async function loadRawFrameFile(
  filePath: string,
  dimensions: FrameDimensions,
  format?: FrameFormat,
): Promise<RawFrame> {
  const contents = await readFile(filePath);
  return {
    bytes: new Uint8Array(contents.buffer, contents.byteOffset, contents.byteLength),
    dimensions: { ...dimensions },
    format,
    sequence: 0,
    receivedAt: Date.now(),
  };
}

export function snapshotFileName(frame: RawFrame): string {
  const { width, height } = frame.dimensions;
  const stamp = new Date(frame.receivedAt).toISOString().replace(/[:.]/g, '-');
  return `frame_${stamp}_${frame.sequence}_${width}x${height}_${frame.format ?? 'unknown'}.raw`;
}

/** Write the frame's bytes unchanged; returns the absolute path written. */
export async function writeRawFrameFile(captureDir: string, frame: RawFrame): Promise<string> {
  const dir = resolve(captureDir);
  await mkdir(dir, { recursive: true });
  const target = join(dir, basename(snapshotFileName(frame)));
  await writeFile(target, frame.bytes);
  return target;
}
