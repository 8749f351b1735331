import { Module } from '@nestjs/common';

import { StreamSessionService } from './stream-session.service';

@Module({
  providers: [StreamSessionService],
  exports: [StreamSessionService],
})
export class StreamModule {}
