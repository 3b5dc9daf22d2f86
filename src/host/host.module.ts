import { DynamicModule, Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { join } from 'node:path';
import { dispatchConfig } from '../config/dispatch.config';
import { SIMPLE_PROJECT_VARIANT } from '../trigger/applicability.service';
import { BUILD_QUEUE } from '../trigger/project';
import { BuildQueueModule } from './build-queue.module';
import { BuildQueueService } from './build-queue.service';
import { createFreestyleVariant } from './freestyle-project';
import { PipelineProjectModule } from './pipeline/pipeline-project.module';

export interface HostModuleOptions {
  /** Install the pipeline project adapter */
  pipelineProjects: boolean;
}

/**
 * Host side of the dispatcher: build queue and project variants.
 * Global so the trigger core can inject BUILD_QUEUE and the variant tokens.
 */
@Module({})
export class HostModule {
  static register(options: HostModuleOptions): DynamicModule {
    const optionalModules = options.pipelineProjects ? [PipelineProjectModule] : [];
    return {
      module: HostModule,
      global: true,
      imports: [BuildQueueModule, ...optionalModules],
      providers: [
        { provide: BUILD_QUEUE, useExisting: BuildQueueService },
        {
          provide: SIMPLE_PROJECT_VARIANT,
          useFactory: (buildQueue: BuildQueueService, config: ConfigType<typeof dispatchConfig>) =>
            createFreestyleVariant(buildQueue, join(config.rootDir, 'jobs')),
          inject: [BuildQueueService, dispatchConfig.KEY],
        },
      ],
      exports: [BUILD_QUEUE, SIMPLE_PROJECT_VARIANT, BuildQueueModule, ...optionalModules],
    };
  }
}
