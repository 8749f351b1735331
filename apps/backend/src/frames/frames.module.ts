import { Module } from '@nestjs/common';

import { StreamModule } from '../stream/stream.module';
import { COLOR_PIPELINE, FrameStatsPipeline } from './color-pipeline';
import { FrameConsumerService } from './frame-consumer.service';
import { FramesController } from './frames.controller';

@Module({
  imports: [StreamModule],
  providers: [
    FrameConsumerService,
    FrameStatsPipeline,
    { provide: COLOR_PIPELINE, useExisting: FrameStatsPipeline },
  ],
  controllers: [FramesController],
  exports: [FrameConsumerService],
})
export class FramesModule {}
