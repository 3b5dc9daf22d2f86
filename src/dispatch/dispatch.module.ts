import { Module } from '@nestjs/common';
import { DispatchEventsService } from './dispatch-events.service';
import { DispatchQueueService } from './dispatch-queue.service';

@Module({
  providers: [DispatchQueueService, DispatchEventsService],
  exports: [DispatchQueueService, DispatchEventsService],
})
export class DispatchModule {}
