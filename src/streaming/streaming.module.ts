import { Module } from '@nestjs/common';
import { DispatchModule } from '../dispatch/dispatch.module';
import { SSEController } from './sse.controller';

@Module({
  imports: [DispatchModule],
  controllers: [SSEController],
})
export class StreamingModule {}
