import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { join } from 'node:path';
import { dispatchConfig } from '../config/dispatch.config';
import { DispatchEvent, DispatchEventsService } from '../dispatch/dispatch-events.service';
import { DispatchQueueService } from '../dispatch/dispatch-queue.service';
import { HOOK_LOG_FILE_NAME, HookLogService } from '../hook-log/hook-log.service';
import { ApplicabilityService } from './applicability.service';
import { buildActions } from './build-action';
import {
  SchedulableProject,
  resolveNextBuildNumber,
  resolveQuietPeriod,
  resolveRootDir,
} from './project';
import { buildCause } from './push-cause';
import type { PushNotification } from './push-notification';
import { SchedulingNegotiatorService } from './scheduling-negotiator.service';

export interface TriggerOptions {
  /** Pin scheduled builds to the pushed head commit */
  passThroughGitCommit: boolean;
}

/**
 * A push trigger attached to one project. `project` is cleared when the binding
 * goes away, so units of work already queued can see it is gone.
 */
export interface TriggerBinding {
  readonly name: string;
  project: SchedulableProject | null;
  readonly passThroughGitCommit: boolean;
}

/**
 * Push trigger: holds the bindings and turns each notification into one unit of
 * work on the dispatch queue (hook log → cause → actions → schedule).
 */
@Injectable()
export class PushTriggerService {
  private readonly logger = new Logger(PushTriggerService.name);
  private readonly bindings = new Map<string, TriggerBinding>();

  constructor(
    private readonly dispatchQueue: DispatchQueueService,
    private readonly negotiator: SchedulingNegotiatorService,
    private readonly hookLog: HookLogService,
    private readonly applicability: ApplicabilityService,
    private readonly events: DispatchEventsService,
    @Inject(dispatchConfig.KEY) private readonly config: ConfigType<typeof dispatchConfig>,
  ) {}

  /**
   * Attach a trigger to a project. Returns null (and logs) when the project is
   * not a kind the trigger supports. Rebinding a name detaches the previous binding.
   */
  bind(project: SchedulableProject, options: TriggerOptions): TriggerBinding | null {
    if (!this.applicability.isApplicable(project)) {
      this.logger.warn(
        `Push trigger is not applicable to ${project.name} (supported kinds: ${this.applicability
          .installedKinds()
          .join(', ')})`,
      );
      return null;
    }

    const previous = this.bindings.get(project.name);
    if (previous) previous.project = null;

    const binding: TriggerBinding = {
      name: project.name,
      project,
      passThroughGitCommit: options.passThroughGitCommit,
    };
    this.bindings.set(project.name, binding);
    return binding;
  }

  unbind(name: string): boolean {
    const binding = this.bindings.get(name);
    if (!binding) return false;
    binding.project = null;
    this.bindings.delete(name);
    return true;
  }

  getBinding(name: string): TriggerBinding | null {
    return this.bindings.get(name) ?? null;
  }

  listBindings(): TriggerBinding[] {
    return [...this.bindings.values()];
  }

  /**
   * Entry point for a parsed push. Never throws and never waits for scheduling;
   * the work runs on the dispatch queue, keyed by the hook log file.
   */
  onPushNotification(binding: TriggerBinding, notification: PushNotification): void {
    this.dispatchQueue.submit(() => this.dispatch(binding, notification), this.getLogFile(binding));
  }

  /** One unit of work. Exposed for callers that want to run it inline. */
  async dispatch(binding: TriggerBinding, notification: PushNotification): Promise<DispatchEvent> {
    const project = binding.project;
    if (!project) {
      this.logger.warn(`Cannot trigger build - ${binding.name} is no longer bound`);
      return this.finish({
        project: binding.name,
        ref: notification.ref,
        status: 'configuration-absent',
        outcome: null,
        hookLogWritten: false,
      });
    }

    const hookLogWritten = await this.writeHookLog(binding, notification);

    this.logger.log(`${project.name} triggered.`);
    const nextBuildNumber = resolveNextBuildNumber(project);
    const cause = buildCause(notification);
    const actions = buildActions(notification, cause, binding.passThroughGitCommit);
    const outcome = await this.negotiator.schedule(
      project,
      resolveQuietPeriod(project),
      cause,
      actions,
    );

    if (outcome.succeeded) {
      const label = nextBuildNumber !== null ? `#${nextBuildNumber}` : 'build';
      this.logger.log(`Triggered ${label} for ${project.name}`);
    } else if (outcome.error) {
      this.logger.warn(`Build for ${project.name} could not be scheduled: ${outcome.error}`);
    } else {
      this.logger.warn(`Build for ${project.name} could not be scheduled (may already be in queue).`);
    }

    return this.finish({
      project: project.name,
      ref: notification.ref,
      status: outcome.succeeded ? 'scheduled' : 'not-scheduled',
      outcome,
      hookLogWritten,
    });
  }

  /** `<project root>/gitbucket-polling.log`, or the shared root when the project has none. */
  getLogFile(binding: TriggerBinding): string {
    const rootDir = binding.project ? resolveRootDir(binding.project) : null;
    return join(rootDir ?? this.config.rootDir, HOOK_LOG_FILE_NAME);
  }

  readHookLog(binding: TriggerBinding): Promise<string> {
    return this.hookLog.read(this.getLogFile(binding));
  }

  private async writeHookLog(binding: TriggerBinding, notification: PushNotification): Promise<boolean> {
    try {
      await this.hookLog.write(this.getLogFile(binding), notification);
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to write webhook log for ${binding.name}: ${message}`);
      return false;
    }
  }

  private finish(event: Omit<DispatchEvent, 'finishedAt'>): DispatchEvent {
    const finished: DispatchEvent = { ...event, finishedAt: new Date().toISOString() };
    this.events.publish(finished);
    return finished;
  }
}
