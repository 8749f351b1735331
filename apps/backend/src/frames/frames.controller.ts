import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Post,
  Put,
} from '@nestjs/common';

import { StreamSessionService } from '../stream/stream-session.service';
import { DecodeFileDto } from './dto/decode-file.dto';
import { UpdateFrameConfigDto } from './dto/update-frame-config.dto';
import { FrameConsumerService } from './frame-consumer.service';
import { FORMAT_CATALOG, FRAME_FORMATS, frameSize, isDimensionCompatible } from './frame-format';
import {
  InsufficientDataError,
  InvalidDimensionsError,
  TransportError,
  UnrecognizedFormatError,
} from './frame.errors';
import { CapturePathError } from './raw-file.loader';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toHttpError(error: unknown): unknown {
  if (
    error instanceof InsufficientDataError ||
    error instanceof UnrecognizedFormatError ||
    error instanceof InvalidDimensionsError ||
    error instanceof CapturePathError
  ) {
    return new BadRequestException(error.message);
  }
  if (error instanceof TransportError) {
    return new BadGatewayException(error.message);
  }
  if (isMissingFile(error)) {
    return new NotFoundException('Raw frame file not found');
  }
  return error;
}

@Controller('frames')
export class FramesController {
  constructor(
    private readonly streamSessionService: StreamSessionService,
    private readonly frameConsumerService: FrameConsumerService,
  ) {}

  @Get('status')
  getStatus() {
    return {
      stream: this.streamSessionService.getStatus(),
      consumer: this.frameConsumerService.getStats(),
    };
  }

  @Get('formats')
  getFormats() {
    const { dimensions } = this.streamSessionService.getSettings();
    return FRAME_FORMATS.map((format) => ({
      ...FORMAT_CATALOG[format],
      expectedBytes: isDimensionCompatible(format, dimensions)
        ? frameSize(format, dimensions)
        : null,
    }));
  }

  @Get('latest')
  getLatest() {
    const latest = this.frameConsumerService.getLatest();
    if (!latest) {
      throw new NotFoundException('No frame decoded yet');
    }
    return latest;
  }

  @Get('config')
  getConfig() {
    return this.streamSessionService.getSettings();
  }

  @Put('config')
  async updateConfig(@Body() dto: UpdateFrameConfigDto) {
    try {
      return await this.streamSessionService.updateSettings({
        width: dto.width,
        height: dto.height,
        format: dto.format,
        toleranceBytes: dto.detectionToleranceBytes,
      });
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Post('restart')
  @HttpCode(200)
  async restart() {
    await this.streamSessionService.restart();
    return this.streamSessionService.getStatus();
  }

  @Post('snapshot')
  async snapshot() {
    const path = await this.frameConsumerService.saveSnapshot();
    if (!path) {
      throw new NotFoundException('No frame received yet');
    }
    return { path };
  }

  @Post('capture')
  async capture() {
    try {
      return await this.frameConsumerService.captureSingle();
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Post('decode-file')
  @HttpCode(200)
  async decodeFile(@Body() dto: DecodeFileDto) {
    try {
      return await this.frameConsumerService.decodeFile(dto.fileName, dto.format);
    } catch (error) {
      throw toHttpError(error);
    }
  }
}
