import { join } from 'node:path';
import type { ProjectEntity } from '../database/entities/project.entity';
import type { QueuedBuild } from '../database/entities/queued-build.entity';
import type { BuildAction } from '../trigger/build-action';
import type { PushCause } from '../trigger/push-cause';
import type { CauseScheduling, QuietPeriodAware, RootDirAware } from '../trigger/project';
import type { BuildQueueService } from './build-queue.service';
import type { HostProjectVariant } from './project-variant';

/**
 * Plain project: schedules with an explicit cause, straight onto the host queue.
 */
export class FreestyleProject implements CauseScheduling, QuietPeriodAware, RootDirAware {
  constructor(
    private readonly definition: ProjectEntity,
    private readonly buildQueue: Pick<BuildQueueService, 'enqueue'>,
    private readonly jobsDir: string,
  ) {}

  get name(): string {
    return this.definition.name;
  }

  getQuietPeriod(): number {
    return this.definition.quiet_period;
  }

  getRootDir(): string {
    return join(this.jobsDir, this.definition.name);
  }

  scheduleBuildWithCause(
    quietPeriod: number,
    cause: PushCause,
    actions: readonly BuildAction[],
  ): Promise<QueuedBuild | null> {
    return this.buildQueue.enqueue(this.name, quietPeriod, actions, cause);
  }
}

export function createFreestyleVariant(
  buildQueue: Pick<BuildQueueService, 'enqueue'>,
  jobsDir: string,
): HostProjectVariant {
  return {
    kind: 'freestyle',
    matches: (target) => target instanceof FreestyleProject,
    create: (definition) => new FreestyleProject(definition, buildQueue, jobsDir),
  };
}
