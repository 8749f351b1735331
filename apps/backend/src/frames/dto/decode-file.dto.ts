import { IsIn, IsOptional, IsString, Matches, MaxLength } from 'class-validator';

import { FRAME_FORMATS } from '../frame-format';
import type { FrameFormat } from '../frame-format';

export class DecodeFileDto {
  @IsString()
  @MaxLength(255)
  @Matches(/^[A-Za-z0-9._-]+$/, { message: 'fileName must be a bare file name' })
  fileName!: string;

  @IsOptional()
  @IsIn(FRAME_FORMATS)
  format?: FrameFormat;
}
