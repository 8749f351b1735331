import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setInterval } from 'node:timers';

import { fetchSingleFrame } from '../stream/http-stream.source';
import { StreamSessionService } from '../stream/stream-session.service';
import { COLOR_PIPELINE, summarizeGrid } from './color-pipeline';
import type { ColorPipeline, DecodedFrame, GridSummary } from './color-pipeline';
import { decodeAuto, describeGridShape } from './frame-decoder';
import { isFrameFormat } from './frame-format';
import type { FrameFormat, SampleBitDepth } from './frame-format';
import {
  InsufficientDataError,
  InvalidDimensionsError,
  UnrecognizedFormatError,
} from './frame.errors';
import type { RawFrame } from './frame.types';
import { loadRawFrameFile, resolveCaptureFile, writeRawFrameFile } from './raw-file.loader';

export interface DecodedFrameSummary {
  sequence: number;
  format: FrameFormat;
  kind: 'bayer' | 'rgb';
  width: number;
  height: number;
  bitDepth: number;
  channelOrder?: 'rgb' | 'bgr';
  shape: number[];
  receivedAt: string;
  stats: GridSummary;
}

export interface ConsumerStats {
  running: boolean;
  pollIntervalMs: number;
  framesDecoded: number;
  fallbackDecodes: number;
  decodeFailures: number;
  idlePolls: number;
  lastSequence: number | null;
}

interface ConsumerSettings {
  pollIntervalMs: number;
  defaultFormat: FrameFormat;
  toleranceBytes: number;
  raw8BitDepth: SampleBitDepth;
  captureDir: string;
}

function toSampleBitDepth(value: number): SampleBitDepth {
  return value === 8 || value === 12 ? value : 10;
}

function isDecodeError(error: unknown): error is Error {
  return (
    error instanceof InsufficientDataError ||
    error instanceof UnrecognizedFormatError ||
    error instanceof InvalidDimensionsError
  );
}

/**
 * Consumer side of the latest-frame queue: polls on a fixed interval, decodes the
 * newest frame and hands it to the color pipeline. When nothing new arrived the last
 * decoded frame stays current.
 */
@Injectable()
export class FrameConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(FrameConsumerService.name);
  private readonly settings: ConsumerSettings;

  private timer?: NodeJS.Timeout;
  private busy = false;
  private lastRaw?: RawFrame;
  private lastDecoded?: DecodedFrame;
  private framesDecoded = 0;
  private fallbackDecodes = 0;
  private decodeFailures = 0;
  private idlePolls = 0;

  constructor(
    private readonly configService: ConfigService,
    private readonly streamSessionService: StreamSessionService,
    @Inject(COLOR_PIPELINE) private readonly colorPipeline: ColorPipeline,
  ) {
    const defaultFormat = this.configService.get<string>('frames.defaultFormat', 'rgb888');
    this.settings = {
      pollIntervalMs: this.configService.get<number>('consumer.pollIntervalMs', 33),
      defaultFormat: isFrameFormat(defaultFormat) ? defaultFormat : 'rgb888',
      toleranceBytes: this.configService.get<number>('frames.detectionToleranceBytes', 1000),
      raw8BitDepth: toSampleBitDepth(this.configService.get<number>('frames.raw8BitDepth', 10)),
      captureDir: this.configService.get<string>('frames.captureDir', 'captures'),
    };
  }

  onModuleInit(): void {
    this.timer = setInterval(() => this.tick(), this.settings.pollIntervalMs);
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Pull and decode the newest queued frame. Returns false when nothing new was
   * queued or the frame could not be decoded.
   */
  async consumeLatest(): Promise<boolean> {
    const pulled = this.streamSessionService.pullLatest();
    if (!pulled.fresh) {
      this.idlePolls += 1;
      return false;
    }
    this.lastRaw = pulled.item;
    return (await this.decodeAndDeliver(pulled.item)) !== undefined;
  }

  getLatest(): DecodedFrameSummary | undefined {
    return this.lastDecoded ? summarizeDecodedFrame(this.lastDecoded) : undefined;
  }

  getStats(): ConsumerStats {
    return {
      running: this.timer !== undefined,
      pollIntervalMs: this.settings.pollIntervalMs,
      framesDecoded: this.framesDecoded,
      fallbackDecodes: this.fallbackDecodes,
      decodeFailures: this.decodeFailures,
      idlePolls: this.idlePolls,
      lastSequence: this.lastDecoded?.sequence ?? null,
    };
  }

  /** Write the last pulled raw payload to the capture directory. */
  async saveSnapshot(): Promise<string | undefined> {
    if (!this.lastRaw) {
      return undefined;
    }
    const path = await writeRawFrameFile(this.settings.captureDir, this.lastRaw);
    this.logger.log(`Saved ${this.lastRaw.bytes.length}-byte snapshot to ${path}`);
    return path;
  }

  /** Fetch one frame from the device's capture endpoint and decode it. */
  async captureSingle(): Promise<DecodedFrameSummary> {
    const settings = this.streamSessionService.getSettings();
    const captured = await fetchSingleFrame(
      settings.captureUrl,
      settings.dimensions,
      settings.connectTimeoutMs,
    );
    const hinted = captured.formatHint;
    const raw: RawFrame = {
      bytes: captured.bytes,
      dimensions: captured.dimensions,
      format: isFrameFormat(hinted) ? hinted : configuredFormat(settings.format),
      sequence: 0,
      receivedAt: Date.now(),
    };
    this.lastRaw = raw;
    return summarizeDecodedFrame(await this.decodeOrThrow(raw));
  }

  /** Decode a raw file from the capture directory with the current dimensions. */
  async decodeFile(fileName: string, format?: FrameFormat): Promise<DecodedFrameSummary> {
    const settings = this.streamSessionService.getSettings();
    const path = resolveCaptureFile(this.settings.captureDir, fileName);
    const raw = await loadRawFrameFile(
      path,
      settings.dimensions,
      format ?? configuredFormat(settings.format),
    );
    return summarizeDecodedFrame(await this.decodeOrThrow(raw));
  }

  private tick(): void {
    if (this.busy) {
      return;
    }
    this.busy = true;
    this.consumeLatest()
      .catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`Frame consumer failed: ${err.message}`, err.stack);
      })
      .finally(() => {
        this.busy = false;
      });
  }

  private async decodeAndDeliver(raw: RawFrame): Promise<DecodedFrame | undefined> {
    let decoded: DecodedFrame;
    try {
      decoded = this.decode(raw);
    } catch (error) {
      if (!isDecodeError(error)) {
        throw error;
      }
      this.decodeFailures += 1;
      this.logger.warn(`Skipping frame ${raw.sequence}: ${error.message}`);
      return undefined;
    }
    await this.colorPipeline.process(decoded);
    return decoded;
  }

  private async decodeOrThrow(raw: RawFrame): Promise<DecodedFrame> {
    const decoded = this.decode(raw);
    await this.colorPipeline.process(decoded);
    return decoded;
  }

  private decode(raw: RawFrame): DecodedFrame {
    const result = decodeAuto(raw, {
      toleranceBytes: this.settings.toleranceBytes,
      fallbackFormat: this.settings.defaultFormat,
      raw8BitDepth: this.settings.raw8BitDepth,
    });
    if (result.fellBack) {
      this.fallbackDecodes += 1;
      this.logger.warn(`Unknown frame size ${raw.bytes.length} bytes; decoding as ${result.format}`);
    }

    const decoded: DecodedFrame = {
      sequence: raw.sequence,
      format: result.format,
      grid: result.grid,
      receivedAt: raw.receivedAt,
    };
    this.framesDecoded += 1;
    this.lastDecoded = decoded;
    return decoded;
  }
}

function configuredFormat(setting: FrameFormat | 'auto'): FrameFormat | undefined {
  return setting === 'auto' ? undefined : setting;
}

export function summarizeDecodedFrame(frame: DecodedFrame): DecodedFrameSummary {
  const { grid } = frame;
  return {
    sequence: frame.sequence,
    format: frame.format,
    kind: grid.kind,
    width: grid.width,
    height: grid.height,
    bitDepth: grid.bitDepth,
    channelOrder: grid.kind === 'rgb' ? grid.channelOrder : undefined,
    shape: describeGridShape(grid),
    receivedAt: new Date(frame.receivedAt).toISOString(),
    stats: summarizeGrid(grid),
  };
}
