import { Module } from '@nestjs/common';
import { DispatchModule } from '../dispatch/dispatch.module';
import { HookLogModule } from '../hook-log/hook-log.module';
import { ApplicabilityService } from './applicability.service';
import { PushTriggerService } from './push-trigger.service';
import { SchedulingNegotiatorService } from './scheduling-negotiator.service';

/**
 * Push trigger core. BUILD_QUEUE and the project variant tokens come from the
 * global HostModule.
 */
@Module({
  imports: [DispatchModule, HookLogModule],
  providers: [ApplicabilityService, SchedulingNegotiatorService, PushTriggerService],
  exports: [PushTriggerService, DispatchModule],
})
export class TriggerModule {}
