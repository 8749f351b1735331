/**
 * Multipart frame reassembly.
 *
 * The device writes `\r\n<boundary>\r\n<headers>\r\n\r\n<payload>` repeatedly with no
 * escaping, so the framer only looks for the boundary token and the first blank line
 * of each segment. Chunk edges may fall anywhere, including inside the token.
 */

export type FramerState = 'idle' | 'accumulating' | 'frame-ready';

export interface StreamFramerOptions {
  boundary: string;
  /** Ceiling for buffered bytes; usually two of the largest expected frames. */
  maxBufferBytes: number;
}

export interface StreamFramerStats {
  bytesReceived: number;
  payloadsEmitted: number;
  segmentsWithoutHeaders: number;
  overflows: number;
  bytesDiscarded: number;
}

const HEADER_SEPARATOR = Buffer.from('\r\n\r\n');
const INITIAL_CAPACITY = 64 * 1024;

export class StreamFramer {
  private readonly marker: Buffer;
  private readonly maxBufferBytes: number;
  private storage = Buffer.alloc(INITIAL_CAPACITY);
  private start = 0;
  private tail = 0;
  // Offset (relative to start) below which no complete marker can begin.
  private scanFrom = 0;
  private framerState: FramerState = 'idle';
  private readonly counters: StreamFramerStats = {
    bytesReceived: 0,
    payloadsEmitted: 0,
    segmentsWithoutHeaders: 0,
    overflows: 0,
    bytesDiscarded: 0,
  };

  constructor(options: StreamFramerOptions) {
    this.marker = Buffer.from(options.boundary);
    if (this.marker.length === 0) {
      throw new Error('Stream boundary must not be empty');
    }
    if (!(options.maxBufferBytes > this.marker.length)) {
      throw new Error(`maxBufferBytes must exceed the boundary length (${this.marker.length})`);
    }
    this.maxBufferBytes = options.maxBufferBytes;
  }

  get state(): FramerState {
    return this.framerState;
  }

  get buffered(): number {
    return this.tail - this.start;
  }

  get stats(): StreamFramerStats {
    return { ...this.counters };
  }

  /**
   * Append a chunk and return every payload completed by it, oldest first.
   */
  feed(chunk: Uint8Array): Buffer[] {
    if (chunk.length === 0) {
      return [];
    }

    this.append(chunk);
    this.counters.bytesReceived += chunk.length;
    if (this.buffered > this.maxBufferBytes) {
      this.trimOverflow();
    }

    const payloads: Buffer[] = [];
    for (;;) {
      const view = this.view();
      const index = view.indexOf(this.marker, this.scanFrom);
      if (index < 0) {
        this.scanFrom = Math.max(0, view.length - this.marker.length + 1);
        break;
      }

      const payload = extractPayload(view.subarray(0, index));
      if (payload) {
        payloads.push(payload);
      } else if (index > 0) {
        this.counters.segmentsWithoutHeaders += 1;
      }
      this.consume(index + this.marker.length);
    }

    this.counters.payloadsEmitted += payloads.length;
    this.framerState = payloads.length > 0 ? 'frame-ready' : 'accumulating';
    return payloads;
  }

  /** Drop everything buffered; the next feed starts a fresh session. */
  end(): void {
    this.counters.bytesDiscarded += this.buffered;
    this.start = 0;
    this.tail = 0;
    this.scanFrom = 0;
    this.framerState = 'idle';
  }

  /**
   * Keep only the bytes from the last boundary on. Without any boundary, keep just
   * enough tail to complete a boundary split across the next chunk.
   */
  private trimOverflow(): void {
    const view = this.view();
    const lastMarker = view.lastIndexOf(this.marker);
    const keepFrom = lastMarker > 0 ? lastMarker : view.length - (this.marker.length - 1);
    this.counters.overflows += 1;
    this.counters.bytesDiscarded += keepFrom;
    this.consume(keepFrom);
  }

  private view(): Buffer {
    return this.storage.subarray(this.start, this.tail);
  }

  private consume(count: number): void {
    this.start += count;
    this.scanFrom = 0;
    if (this.start === this.tail) {
      this.start = 0;
      this.tail = 0;
    }
  }

  private append(chunk: Uint8Array): void {
    const length = this.buffered;
    const required = length + chunk.length;
    if (this.tail + chunk.length > this.storage.length) {
      if (required > this.storage.length) {
        let capacity = this.storage.length;
        while (capacity < required) {
          capacity *= 2;
        }
        const grown = Buffer.alloc(capacity);
        this.storage.copy(grown, 0, this.start, this.tail);
        this.storage = grown;
      } else {
        this.storage.copyWithin(0, this.start, this.tail);
      }
      this.start = 0;
      this.tail = length;
    }
    this.storage.set(chunk, this.tail);
    this.tail += chunk.length;
  }
}

function extractPayload(segment: Buffer): Buffer | undefined {
  const headerEnd = segment.indexOf(HEADER_SEPARATOR);
  if (headerEnd < 0) {
    return undefined;
  }
  // Copy out: the backing storage is reused for later chunks.
  return Buffer.from(segment.subarray(headerEnd + HEADER_SEPARATOR.length));
}
