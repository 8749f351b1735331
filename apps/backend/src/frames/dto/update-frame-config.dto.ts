import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';

import { FRAME_FORMATS } from '../frame-format';
import type { FrameFormatSetting } from '../frame-format';

export const FRAME_FORMAT_SETTINGS: readonly FrameFormatSetting[] = ['auto', ...FRAME_FORMATS];

export class UpdateFrameConfigDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(16384)
  width?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(16384)
  height?: number;

  @IsOptional()
  @IsIn(FRAME_FORMAT_SETTINGS)
  format?: FrameFormatSetting;

  @IsOptional()
  @IsInt()
  @Min(0)
  detectionToleranceBytes?: number;
}
