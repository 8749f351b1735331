import { TransportError } from '../frames/frame.errors';
import type { StreamSource } from '../stream/http-stream.source';
import type { Scheduler } from '../stream/scheduler';

export const BOUNDARY = '--raw_frame_boundary';

/** Inverse of the MIPI RAW10 unpacker; `samples.length` must be a multiple of 4. */
export function packRaw10FivePerFour(samples: readonly number[]): Uint8Array {
  const out = new Uint8Array((samples.length / 4) * 5);
  for (let px = 0, o = 0; px < samples.length; px += 4, o += 5) {
    let low = 0;
    for (let k = 0; k < 4; k++) {
      out[o + k] = samples[px + k] >> 2;
      low |= (samples[px + k] & 0x03) << (2 * k);
    }
    out[o + 4] = low;
  }
  return out;
}

export function packRaw12MsbFirst(samples: readonly number[]): Uint8Array {
  const out = new Uint8Array((samples.length / 2) * 3);
  for (let px = 0, o = 0; px < samples.length; px += 2, o += 3) {
    out[o] = samples[px] >> 4;
    out[o + 1] = samples[px + 1] >> 4;
    out[o + 2] = (samples[px] & 0x0f) | ((samples[px + 1] & 0x0f) << 4);
  }
  return out;
}

export function packRaw12Sbggr(samples: readonly number[]): Uint8Array {
  const out = new Uint8Array((samples.length / 2) * 3);
  for (let px = 0, o = 0; px < samples.length; px += 2, o += 3) {
    out[o] = samples[px] & 0xff;
    out[o + 1] = samples[px + 1] & 0xff;
    out[o + 2] = (samples[px] >> 8) | ((samples[px + 1] >> 8) << 4);
  }
  return out;
}

export function packWordsLe(words: readonly number[]): Uint8Array {
  const out = new Uint8Array(words.length * 2);
  words.forEach((word, i) => {
    out[i * 2] = word & 0xff;
    out[i * 2 + 1] = (word >> 8) & 0xff;
  });
  return out;
}

export function rgb565Word(r: number, g: number, b: number): number {
  return ((r >> 3) << 11) | ((g >> 2) << 5) | (b >> 3);
}

/** Bytes the way the device writes them: every part is preceded by CRLF and the boundary. */
export function buildMultipartStream(
  payloads: readonly Uint8Array[],
  boundary = BOUNDARY,
): Buffer {
  const parts: Buffer[] = [];
  for (const payload of payloads) {
    parts.push(
      Buffer.from(
        `\r\n${boundary}\r\nContent-Type: application/octet-stream\r\nContent-Length: ${payload.length}\r\n\r\n`,
      ),
      Buffer.from(payload),
    );
  }
  // Closing boundary so the last part is complete.
  parts.push(Buffer.from(`\r\n${boundary}\r\n`));
  return Buffer.concat(parts);
}

export function splitIntoChunks(bytes: Uint8Array, size: number): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  for (let i = 0; i < bytes.length; i += size) {
    chunks.push(bytes.subarray(i, i + size));
  }
  return chunks;
}

export function patternBytes(length: number, seed = 7): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    out[i] = (i * seed) & 0xff;
  }
  return out;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

export type ScriptedConnection = readonly Uint8Array[] | Error;

/**
 * In-process stream source: each `open` plays the next scripted connection. Once the
 * script runs out, connections stay open without data until aborted.
 */
export class FakeStreamSource implements StreamSource {
  readonly description = 'fake://device/stream';
  opens = 0;
  /** Idle connections currently held open. */
  active = 0;
  private readonly script: ScriptedConnection[];

  constructor(script: readonly ScriptedConnection[] = []) {
    this.script = [...script];
  }

  async open(signal: AbortSignal): Promise<AsyncIterable<Uint8Array>> {
    this.opens += 1;
    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ? playChunks(next) : this.idleUntilAborted(signal);
  }

  private async *idleUntilAborted(signal: AbortSignal): AsyncGenerator<Uint8Array> {
    this.active += 1;
    try {
      await waitForAbort(signal);
      throw new TransportError('connection aborted');
    } finally {
      this.active -= 1;
    }
  }
}

async function* playChunks(chunks: readonly Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield chunk;
  }
}


/** Clock that only moves when told to; sleeps complete at once and advance it. */
export class ManualScheduler implements Scheduler {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    this.sleeps.push(ms);
    this.time += ms;
    return !signal?.aborted;
  }
}
