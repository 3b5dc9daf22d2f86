import { Module } from '@nestjs/common';
import { DispatchController } from './dispatch.controller';
import { DispatchModule } from '../../dispatch/dispatch.module';

@Module({
  imports: [DispatchModule],
  controllers: [DispatchController],
})
export class DispatchApiModule {}
