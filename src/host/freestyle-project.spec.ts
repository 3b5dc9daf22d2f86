import { Logger } from '@nestjs/common';
import { join } from 'node:path';
import { ProjectEntity, ProjectKind } from '../database/entities';
import { PushCause } from '../trigger/push-cause';
import { ScheduleMechanism, SchedulingNegotiatorService } from '../trigger/scheduling-negotiator.service';
import type { BuildQueueService } from './build-queue.service';
import { createFreestyleVariant, FreestyleProject } from './freestyle-project';
import { createPipelineVariant, PipelineProject } from './pipeline/pipeline-project';

function definition(name: string, kind: ProjectKind, quietPeriod: number): ProjectEntity {
  return Object.assign(new ProjectEntity(), {
    name,
    kind,
    repository: `http://gitbucket.local/alice/${name}.git`,
    quiet_period: quietPeriod,
    pass_through_git_commit: false,
  });
}

describe('host project variants', () => {
  const jobsDir = '/srv/dispatch/jobs';
  const enqueue = jest.fn();
  const buildQueue: Pick<BuildQueueService, 'enqueue'> = { enqueue };
  const negotiator = new SchedulingNegotiatorService();
  const cause = new PushCause('bob');
  const actions = [{ kind: 'cause', cause }] as const;

  beforeEach(() => {
    enqueue.mockReset();
    enqueue.mockResolvedValue({ id: 'b1' });
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('schedules freestyle projects with an explicit cause', async () => {
    const variant = createFreestyleVariant(buildQueue, jobsDir);
    const project = variant.create(definition('frontend-app', 'freestyle', 5));

    expect(variant.matches(project)).toBe(true);
    expect(project.getRootDir?.()).toBe(join(jobsDir, 'frontend-app'));
    expect(project.getQuietPeriod?.()).toBe(5);

    const outcome = await negotiator.schedule(project, 5, cause, actions);

    expect(outcome).toEqual({
      attempted: true,
      succeeded: true,
      mechanism: ScheduleMechanism.DirectByProject,
      operation: 'scheduleBuildWithCause',
    });
    expect(enqueue).toHaveBeenCalledWith('frontend-app', 5, actions, cause);
  });

  it('schedules pipeline projects through their actions', async () => {
    const variant = createPipelineVariant(buildQueue, jobsDir);
    const project = variant.create(definition('backend-api', 'pipeline', 0));

    expect(variant.matches(project)).toBe(true);
    expect(variant.matches(new FreestyleProject(definition('x', 'freestyle', 0), buildQueue, jobsDir))).toBe(
      false,
    );

    const outcome = await negotiator.schedule(project, 0, cause, actions);

    expect(outcome.operation).toBe('scheduleBuildWithActions');
    expect(outcome.succeeded).toBe(true);
    expect(enqueue).toHaveBeenCalledWith('backend-api', 0, actions);
  });

  it('reports a declined enqueue as not scheduled', async () => {
    enqueue.mockResolvedValue(null);
    const project = new PipelineProject(definition('backend-api', 'pipeline', 0), buildQueue, jobsDir);

    const outcome = await negotiator.schedule(project, 0, cause, actions);

    expect(outcome.succeeded).toBe(false);
    expect(outcome.attempted).toBe(true);
  });
});
