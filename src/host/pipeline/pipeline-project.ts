import { join } from 'node:path';
import type { ProjectEntity } from '../../database/entities/project.entity';
import type { QueuedBuild } from '../../database/entities/queued-build.entity';
import type { BuildAction } from '../../trigger/build-action';
import type { ActionsScheduling, QuietPeriodAware, RootDirAware } from '../../trigger/project';
import type { BuildQueueService } from '../build-queue.service';
import type { HostProjectVariant } from '../project-variant';

/**
 * Pipeline project: its scheduling takes actions only, the cause travels in the CauseAction.
 */
export class PipelineProject implements ActionsScheduling, QuietPeriodAware, RootDirAware {
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

  scheduleBuildWithActions(quietPeriod: number, actions: readonly BuildAction[]): Promise<QueuedBuild | null> {
    return this.buildQueue.enqueue(this.name, quietPeriod, actions);
  }
}

export function createPipelineVariant(
  buildQueue: Pick<BuildQueueService, 'enqueue'>,
  jobsDir: string,
): HostProjectVariant {
  return {
    kind: 'pipeline',
    matches: (target) => target instanceof PipelineProject,
    create: (definition) => new PipelineProject(definition, buildQueue, jobsDir),
  };
}
