import { Module } from '@nestjs/common';
import { HookLogService } from './hook-log.service';

@Module({
  providers: [HookLogService],
  exports: [HookLogService],
})
export class HookLogModule {}
