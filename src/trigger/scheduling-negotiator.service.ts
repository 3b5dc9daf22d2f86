import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { BuildAction } from './build-action';
import type { PushCause } from './push-cause';
import {
  BUILD_QUEUE,
  BuildQueue,
  SchedulableProject,
  supportsActionsScheduling,
  supportsBooleanScheduling,
  supportsCauseScheduling,
} from './project';

export enum ScheduleMechanism {
  DirectByProject = 'direct-by-project',
  QueueFallback = 'queue-fallback',
  None = 'none',
}

export type SchedulingOperation =
  | 'scheduleBuildWithActions'
  | 'scheduleBuildWithCause'
  | 'scheduleBuild'
  | 'queue';

export interface ScheduleOutcome {
  attempted: boolean;
  succeeded: boolean;
  mechanism: ScheduleMechanism;
  operation: SchedulingOperation | null;
  /** Message of the error the invoked operation raised, if any */
  error?: string;
}

interface ScheduleRequest {
  quietPeriod: number;
  cause: PushCause;
  actions: readonly BuildAction[];
}

type Invoker = (request: ScheduleRequest) => Promise<boolean>;

interface DirectTier {
  operation: Exclude<SchedulingOperation, 'queue'>;
  /** Returns a bound invoker when the project exposes the operation, null otherwise. */
  probe(project: SchedulableProject): Invoker | null;
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

// Richest operation first.
const DIRECT_TIERS: readonly DirectTier[] = [
  {
    operation: 'scheduleBuildWithActions',
    probe: (project) => {
      if (!supportsActionsScheduling(project)) return null;
      const target = project;
      return async ({ quietPeriod, actions }) =>
        isPresent(await target.scheduleBuildWithActions(quietPeriod, actions));
    },
  },
  {
    operation: 'scheduleBuildWithCause',
    probe: (project) => {
      if (!supportsCauseScheduling(project)) return null;
      const target = project;
      return async ({ quietPeriod, cause, actions }) =>
        isPresent(await target.scheduleBuildWithCause(quietPeriod, cause, actions));
    },
  },
  {
    operation: 'scheduleBuild',
    probe: (project) => {
      if (!supportsBooleanScheduling(project)) return null;
      const target = project;
      return async ({ quietPeriod, cause, actions }) =>
        (await target.scheduleBuild(quietPeriod, cause, actions)) === true;
    },
  },
];

/**
 * Schedules a build on a project whose concrete type is unknown.
 * Tries the project's own scheduling operations in priority order and falls back
 * to the host queue when it exposes none. Failures become a not-scheduled outcome;
 * nothing is thrown to the caller.
 */
@Injectable()
export class SchedulingNegotiatorService {
  private readonly logger = new Logger(SchedulingNegotiatorService.name);

  constructor(@Optional() @Inject(BUILD_QUEUE) private readonly buildQueue?: BuildQueue) {}

  async schedule(
    project: SchedulableProject,
    quietPeriod: number,
    cause: PushCause,
    actions: readonly BuildAction[],
  ): Promise<ScheduleOutcome> {
    const request: ScheduleRequest = { quietPeriod, cause, actions };

    for (const tier of DIRECT_TIERS) {
      const invoke = tier.probe(project);
      if (!invoke) continue;
      return this.invoke(project, tier.operation, ScheduleMechanism.DirectByProject, () =>
        invoke(request),
      );
    }

    const buildQueue = this.buildQueue;
    if (!buildQueue) {
      this.logger.warn(
        `Project ${project.name} exposes no scheduling operation and no build queue is installed`,
      );
      return {
        attempted: false,
        succeeded: false,
        mechanism: ScheduleMechanism.None,
        operation: null,
      };
    }

    return this.invoke(project, 'queue', ScheduleMechanism.QueueFallback, async () =>
      isPresent(await buildQueue.schedule(project, quietPeriod, actions)),
    );
  }

  private async invoke(
    project: SchedulableProject,
    operation: SchedulingOperation,
    mechanism: ScheduleMechanism,
    call: () => Promise<boolean>,
  ): Promise<ScheduleOutcome> {
    try {
      const succeeded = await call();
      if (succeeded) {
        this.logger.debug(`Scheduled ${project.name} using ${operation}`);
      }
      return { attempted: true, succeeded, mechanism, operation };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to schedule build for ${project.name} via ${operation}: ${message}`);
      return { attempted: true, succeeded: false, mechanism, operation, error: message };
    }
  }
}
