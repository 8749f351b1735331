import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Observable, Subject, Subscription } from 'rxjs';

import { assertDimensions, isFrameFormat, largestFrameSize } from '../frames/frame-format';
import type { FrameFormatSetting } from '../frames/frame-format';
import { InvalidDimensionsError } from '../frames/frame.errors';
import type { FrameDimensions, RawFrame } from '../frames/frame.types';
import { HttpStreamSource } from './http-stream.source';
import type { StreamSource } from './http-stream.source';
import type { PullResult } from './latest-frame-queue';
import type { ReconnectOptions } from './reconnect-policy';
import { StreamSession } from './stream-session';
import type { StreamSessionStats } from './stream-session';

export interface StreamSettings {
  enabled: boolean;
  url: string;
  captureUrl: string;
  boundary: string;
  dimensions: FrameDimensions;
  format: FrameFormatSetting;
  toleranceBytes: number;
  minFrameBytes: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  reconnect: ReconnectOptions;
}

export interface StreamSettingsUpdate {
  width?: number;
  height?: number;
  format?: FrameFormatSetting;
  toleranceBytes?: number;
}

export interface StreamStatus extends StreamSessionStats {
  enabled: boolean;
  running: boolean;
  url: string;
  dimensions: FrameDimensions;
  format: FrameFormatSetting;
}

@Injectable()
export class StreamSessionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(StreamSessionService.name);
  private readonly frames$ = new Subject<RawFrame>();

  private settings: StreamSettings;
  private session: StreamSession;
  private sessionSubscription?: Subscription;
  private destroyed = false;

  constructor(private readonly configService: ConfigService) {
    this.settings = this.readSettings();
    this.session = this.createSession();
  }

  onModuleInit(): void {
    if (!this.settings.enabled) {
      this.logger.log('Stream ingestion disabled via configuration');
      return;
    }
    this.startSession();
  }

  async onModuleDestroy(): Promise<void> {
    this.destroyed = true;
    await this.teardownSession();
    this.frames$.complete();
  }

  getSettings(): StreamSettings {
    return {
      ...this.settings,
      dimensions: { ...this.settings.dimensions },
      reconnect: { ...this.settings.reconnect },
    };
  }

  /**
   * Apply new decoder settings and restart ingestion. Throws InvalidDimensionsError
   * before touching the running session when the combination is unusable.
   */
  async updateSettings(update: StreamSettingsUpdate): Promise<StreamSettings> {
    const dimensions: FrameDimensions = {
      width: update.width ?? this.settings.dimensions.width,
      height: update.height ?? this.settings.dimensions.height,
    };
    const format = update.format ?? this.settings.format;
    validateDecoderSettings(format, dimensions);

    this.settings = {
      ...this.settings,
      dimensions,
      format,
      toleranceBytes: update.toleranceBytes ?? this.settings.toleranceBytes,
    };
    this.logger.log(
      `Decoder settings updated: ${dimensions.width}x${dimensions.height}, format ${format}`,
    );
    await this.restart();
    return this.getSettings();
  }

  /**
   * Replace the session (dropping the pinned format) and start the new one once the
   * old one has shut down. Overlapping restarts leave only the newest session running.
   */
  async restart(): Promise<void> {
    const previous = this.session;
    const next = this.createSession();
    this.session = next;
    this.sessionSubscription?.unsubscribe();
    this.sessionSubscription = undefined;

    await previous.dispose();
    if (this.session !== next || this.destroyed || !this.settings.enabled) {
      return;
    }
    this.startSession();
  }

  pullLatest(): PullResult<RawFrame> {
    return this.session.pullLatest();
  }

  getFrameStream(): Observable<RawFrame> {
    return this.frames$.asObservable();
  }

  getStatus(): StreamStatus {
    return {
      ...this.session.getStats(),
      enabled: this.settings.enabled,
      running: this.session.running,
      url: this.settings.url,
      dimensions: { ...this.settings.dimensions },
      format: this.settings.format,
    };
  }

  protected createSource(settings: StreamSettings): StreamSource {
    return new HttpStreamSource({
      url: settings.url,
      connectTimeoutMs: settings.connectTimeoutMs,
      readTimeoutMs: settings.readTimeoutMs,
    });
  }

  private createSession(): StreamSession {
    const { dimensions, format, toleranceBytes, minFrameBytes, boundary, reconnect } =
      this.settings;
    return new StreamSession(
      { dimensions, format, toleranceBytes, minFrameBytes, boundary, reconnect },
      { source: this.createSource(this.settings) },
    );
  }

  private startSession(): void {
    this.sessionSubscription = this.session
      .getFrameStream()
      .subscribe((frame) => this.frames$.next(frame));
    this.logger.log(`Starting stream ingestion from ${this.settings.url}`);
    this.session.start();
  }

  private async teardownSession(): Promise<void> {
    this.sessionSubscription?.unsubscribe();
    this.sessionSubscription = undefined;
    await this.session.dispose();
  }

  private readSettings(): StreamSettings {
    const formatSetting = this.configService.get<string>('frames.format', 'auto');
    const format: FrameFormatSetting = isFrameFormat(formatSetting) ? formatSetting : 'auto';
    const dimensions: FrameDimensions = {
      width: this.configService.get<number>('frames.width', 1936),
      height: this.configService.get<number>('frames.height', 1100),
    };
    validateDecoderSettings(format, dimensions);

    return {
      enabled: this.configService.get<boolean>('stream.enabled', true),
      url: this.configService.get<string>('stream.url', 'http://192.168.4.1/stream'),
      captureUrl: this.configService.get<string>('stream.captureUrl', 'http://192.168.4.1/capture'),
      boundary: this.configService.get<string>('stream.boundary', '--raw_frame_boundary'),
      dimensions,
      format,
      toleranceBytes: this.configService.get<number>('frames.detectionToleranceBytes', 1000),
      minFrameBytes: this.configService.get<number>('frames.minFrameBytes', 1000),
      connectTimeoutMs: this.configService.get<number>('stream.connectTimeoutMs', 10_000),
      readTimeoutMs: this.configService.get<number>('stream.readTimeoutMs', 10_000),
      reconnect: {
        baseDelayMs: this.configService.get<number>('stream.reconnectBaseMs', 500),
        maxDelayMs: this.configService.get<number>('stream.reconnectMaxMs', 500),
        jitter: this.configService.get<number>('stream.reconnectJitter', 0),
        maxAttempts: this.configService.get<number>('stream.reconnectMaxAttempts', 0),
      },
    };
  }
}

function validateDecoderSettings(format: FrameFormatSetting, dimensions: FrameDimensions): void {
  if (format !== 'auto') {
    assertDimensions(format, dimensions);
    return;
  }
  if (largestFrameSize(dimensions) === 0) {
    throw new InvalidDimensionsError('raw8', dimensions, 1);
  }
}
