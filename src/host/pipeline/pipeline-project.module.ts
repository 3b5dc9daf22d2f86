import { Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { join } from 'node:path';
import { dispatchConfig } from '../../config/dispatch.config';
import { PIPELINE_PROJECT_VARIANT } from '../../trigger/applicability.service';
import { BuildQueueModule } from '../build-queue.module';
import { BuildQueueService } from '../build-queue.service';
import { createPipelineVariant } from './pipeline-project';

/**
 * Optional adapter: without this module pipeline projects are simply not applicable.
 */
@Module({
  imports: [BuildQueueModule],
  providers: [
    {
      provide: PIPELINE_PROJECT_VARIANT,
      useFactory: (buildQueue: BuildQueueService, config: ConfigType<typeof dispatchConfig>) =>
        createPipelineVariant(buildQueue, join(config.rootDir, 'jobs')),
      inject: [BuildQueueService, dispatchConfig.KEY],
    },
  ],
  exports: [PIPELINE_PROJECT_VARIANT],
})
export class PipelineProjectModule {}
