import { Logger } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';

import { FormatDetector } from '../frames/format-detector';
import { frameSize, largestFrameSize } from '../frames/frame-format';
import type { FrameFormat, FrameFormatSetting } from '../frames/frame-format';
import type { FrameDimensions, RawFrame } from '../frames/frame.types';
import type { StreamSource } from './http-stream.source';
import { FrameRateMeter } from './frame-rate-meter';
import { LatestFrameQueue } from './latest-frame-queue';
import type { PullResult } from './latest-frame-queue';
import { DEFAULT_RECONNECT_OPTIONS, ReconnectPolicy } from './reconnect-policy';
import type { ConnectionState, ReconnectOptions } from './reconnect-policy';
import { systemScheduler } from './scheduler';
import type { Scheduler } from './scheduler';
import { StreamFramer } from './stream-framer';

export interface StreamSessionOptions {
  dimensions: FrameDimensions;
  format: FrameFormatSetting;
  toleranceBytes: number;
  /** Payloads below this size are treated as stream noise. */
  minFrameBytes: number;
  boundary: string;
  /** Defaults to two of the largest frames any format produces at `dimensions`. */
  maxBufferBytes?: number;
  reconnect?: ReconnectOptions;
}

export interface StreamSessionDeps {
  source: StreamSource;
  scheduler?: Scheduler;
  random?: () => number;
}

export interface StreamSessionStats {
  state: ConnectionState;
  framesPerSecond: number;
  framesReceived: number;
  droppedFrames: number;
  pinnedFormat: FrameFormat | null;
  reconnectAttempts: number;
  lastError: string | null;
  lastFrameAt: number | null;
  bytesReceived: number;
  overflowCount: number;
  noisePayloads: number;
  unrecognizedPayloads: number;
  truncatedPayloads: number;
}

type PayloadOutcome =
  | { kind: 'accepted'; frame: RawFrame }
  | { kind: 'noise' }
  | { kind: 'unrecognized' }
  | { kind: 'truncated'; format: FrameFormat; expected: number };

/**
 * One ingestion task: source → framer → format resolution → latest-frame queue.
 * Reconnects through ReconnectPolicy until stopped or out of attempts.
 */
export class StreamSession {
  private readonly logger = new Logger(StreamSession.name);
  private readonly frames$ = new Subject<RawFrame>();
  private readonly queue = new LatestFrameQueue<RawFrame>();
  private readonly framer: StreamFramer;
  private readonly detector: FormatDetector;
  private readonly meter: FrameRateMeter;
  private readonly policy: ReconnectPolicy;
  private readonly source: StreamSource;
  private readonly scheduler: Scheduler;

  private loop?: Promise<void>;
  private abortController = new AbortController();
  private stopRequested = false;
  private sequence = 0;
  private framesReceived = 0;
  private lastFrameAt?: number;
  private noisePayloads = 0;
  private unrecognizedPayloads = 0;
  private truncatedPayloads = 0;

  constructor(
    private readonly options: StreamSessionOptions,
    deps: StreamSessionDeps,
  ) {
    this.source = deps.source;
    this.scheduler = deps.scheduler ?? systemScheduler;
    this.framer = new StreamFramer({
      boundary: options.boundary,
      maxBufferBytes: options.maxBufferBytes ?? 2 * largestFrameSize(options.dimensions),
    });
    this.detector = new FormatDetector(options.dimensions, options.toleranceBytes);
    this.pinConfiguredFormat();
    this.meter = new FrameRateMeter(this.scheduler);
    this.policy = new ReconnectPolicy(options.reconnect ?? DEFAULT_RECONNECT_OPTIONS, deps.random);
  }

  get running(): boolean {
    return this.loop !== undefined;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.stopRequested = false;
    this.abortController = new AbortController();
    this.policy.reset();
    this.loop = this.run()
      .catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`Stream session crashed: ${err.message}`, err.stack);
        this.policy.stop();
      })
      .finally(() => {
        this.loop = undefined;
      });
  }

  /** Abort the current read or backoff and wait for the loop to exit. */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.abortController.abort();
    const loop = this.loop;
    if (loop) {
      await loop;
    }
    this.policy.stop();
  }

  /** Stop for good; completes the frame stream. */
  async dispose(): Promise<void> {
    await this.stop();
    this.frames$.complete();
  }

  pullLatest(): PullResult<RawFrame> {
    return this.queue.pullLatest();
  }

  getFrameStream(): Observable<RawFrame> {
    return this.frames$.asObservable();
  }

  getStats(): StreamSessionStats {
    const framerStats = this.framer.stats;
    return {
      state: this.policy.state,
      framesPerSecond: Number(this.meter.framesPerSecond.toFixed(2)),
      framesReceived: this.framesReceived,
      droppedFrames: this.queue.dropped,
      pinnedFormat: this.detector.pinned ?? null,
      reconnectAttempts: this.policy.reconnectAttempts,
      lastError: this.policy.lastError ?? null,
      lastFrameAt: this.lastFrameAt ?? null,
      bytesReceived: framerStats.bytesReceived,
      overflowCount: framerStats.overflows,
      noisePayloads: this.noisePayloads,
      unrecognizedPayloads: this.unrecognizedPayloads,
      truncatedPayloads: this.truncatedPayloads,
    };
  }

  private async run(): Promise<void> {
    const signal = this.abortController.signal;

    while (!this.stopRequested) {
      this.policy.beginAttempt();
      this.resetIngestion();

      try {
        const chunks = await this.source.open(signal);
        this.policy.connected();
        this.logger.log(`Connected to ${this.source.description}`);
        for await (const chunk of chunks) {
          if (this.stopRequested) {
            break;
          }
          this.ingest(chunk);
        }
        if (this.stopRequested) {
          break;
        }
        this.policy.failed('stream closed by peer');
        this.logger.warn(`Stream ${this.source.description} closed by peer`);
      } catch (error) {
        if (this.stopRequested) {
          break;
        }
        const message = error instanceof Error ? error.message : String(error);
        this.policy.failed(message);
        this.logger.warn(`Stream error: ${message}`);
      }

      const delayMs = this.policy.scheduleBackoff();
      if (delayMs === undefined) {
        this.logger.error(
          `Giving up on ${this.source.description} after ${this.policy.reconnectAttempts} reconnect attempts`,
        );
        return;
      }
      this.logger.log(`Reconnecting in ${delayMs}ms (attempt ${this.policy.reconnectAttempts})`);
      const waited = await this.scheduler.sleep(delayMs, signal);
      if (!waited) {
        break;
      }
    }

    this.framer.end();
    this.policy.stop();
  }

  private resetIngestion(): void {
    this.framer.end();
    this.meter.reset();
    this.detector.reset();
    this.pinConfiguredFormat();
  }

  private pinConfiguredFormat(): void {
    if (this.options.format !== 'auto') {
      this.detector.pin(this.options.format);
    }
  }

  private ingest(chunk: Uint8Array): void {
    const overflowsBefore = this.framer.stats.overflows;
    const payloads = this.framer.feed(chunk);
    if (this.framer.stats.overflows > overflowsBefore) {
      this.logger.warn(
        `Stream buffer exceeded its ceiling; kept ${this.framer.buffered} bytes from the last boundary`,
      );
    }

    for (const payload of payloads) {
      const outcome = this.classifyPayload(payload);
      switch (outcome.kind) {
        case 'accepted':
          this.publish(outcome.frame);
          break;
        case 'noise':
          this.noisePayloads += 1;
          this.logger.debug(`Ignoring ${payload.length}-byte fragment`);
          break;
        case 'unrecognized':
          this.unrecognizedPayloads += 1;
          this.logger.warn(`Unknown frame size: ${payload.length} bytes`);
          break;
        case 'truncated':
          this.truncatedPayloads += 1;
          this.logger.warn(
            `Dropping truncated ${outcome.format} frame: ${payload.length} of ${outcome.expected} bytes`,
          );
          break;
      }
    }
  }

  private classifyPayload(payload: Buffer): PayloadOutcome {
    if (payload.length < this.options.minFrameBytes) {
      return { kind: 'noise' };
    }

    const wasPinned = this.detector.pinned !== undefined;
    const format = this.detector.resolve(payload.length);
    if (!format) {
      return { kind: 'unrecognized' };
    }
    if (!wasPinned) {
      this.logger.log(`Detected frame format ${format} from a ${payload.length}-byte payload`);
    }

    const expected = frameSize(format, this.options.dimensions);
    if (payload.length < expected) {
      return { kind: 'truncated', format, expected };
    }
    // A pinned format resolves without looking at the length; merged or corrupt
    // segments must still land within tolerance of its frame size.
    if (payload.length - expected > this.options.toleranceBytes) {
      return { kind: 'unrecognized' };
    }

    this.sequence += 1;
    return {
      kind: 'accepted',
      frame: {
        bytes: payload.subarray(0, expected),
        dimensions: { ...this.options.dimensions },
        format,
        sequence: this.sequence,
        receivedAt: this.scheduler.now(),
      },
    };
  }

  private publish(frame: RawFrame): void {
    this.framesReceived += 1;
    this.lastFrameAt = frame.receivedAt;
    this.queue.push(frame);
    const rate = this.meter.tick();
    if (rate !== undefined) {
      this.logger.debug(`Stream rate ${rate.toFixed(1)} fps, ${this.queue.dropped} dropped`);
    }
    this.frames$.next(frame);
  }
}
