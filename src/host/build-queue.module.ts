import { Module } from '@nestjs/common';
import { BuildQueueService } from './build-queue.service';

@Module({
  providers: [BuildQueueService],
  exports: [BuildQueueService],
})
export class BuildQueueModule {}
