import { Logger } from '@nestjs/common';
import type { BuildAction } from './build-action';
import type { PushCause } from './push-cause';

export type MaybePromise<T> = T | Promise<T>;

/** Whatever a project hands back for a scheduled build; only presence matters here. */
export interface BuildHandle {
  readonly id: string;
}

export interface QueueItem {
  readonly id: string;
}

/** Tier 1: the project's own scheduling takes actions only, the cause rides in a CauseAction. */
export interface ActionsScheduling {
  scheduleBuildWithActions(
    quietPeriod: number,
    actions: readonly BuildAction[],
  ): MaybePromise<BuildHandle | null | undefined>;
}

/** Tier 2 */
export interface CauseScheduling {
  scheduleBuildWithCause(
    quietPeriod: number,
    cause: PushCause,
    actions: readonly BuildAction[],
  ): MaybePromise<BuildHandle | null | undefined>;
}

/** Tier 3: older projects that only report whether the build was queued. */
export interface BooleanScheduling {
  scheduleBuild(quietPeriod: number, cause: PushCause, actions: readonly BuildAction[]): MaybePromise<boolean>;
}

export interface QuietPeriodAware {
  getQuietPeriod(): number;
}

export interface RootDirAware {
  getRootDir(): string;
}

export interface BuildNumberAware {
  getNextBuildNumber(): number;
}

/**
 * A buildable unit owned by the host. No variant list is closed over here:
 * the dispatcher only asks which of the operations above a project exposes.
 */
export type SchedulableProject = { readonly name: string } & Partial<
  ActionsScheduling &
    CauseScheduling &
    BooleanScheduling &
    QuietPeriodAware &
    RootDirAware &
    BuildNumberAware
>;

/** Host-wide queue used when a project exposes none of the scheduling tiers. */
export interface BuildQueue {
  schedule(
    project: SchedulableProject,
    quietPeriod: number,
    actions: readonly BuildAction[],
  ): MaybePromise<QueueItem | null | undefined>;
}

export const BUILD_QUEUE = Symbol('BUILD_QUEUE');

const logger = new Logger('SchedulableProject');

export function supportsActionsScheduling(
  project: SchedulableProject,
): project is SchedulableProject & ActionsScheduling {
  return typeof project.scheduleBuildWithActions === 'function';
}

export function supportsCauseScheduling(
  project: SchedulableProject,
): project is SchedulableProject & CauseScheduling {
  return typeof project.scheduleBuildWithCause === 'function';
}

export function supportsBooleanScheduling(
  project: SchedulableProject,
): project is SchedulableProject & BooleanScheduling {
  return typeof project.scheduleBuild === 'function';
}

function warnAccessorFailure(project: SchedulableProject, accessor: string, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  logger.warn(`Cannot read ${accessor} of ${project.name}, using the default: ${message}`);
}

/** Seconds to hold a scheduled build back; 0 unless the project reports a non-negative integer. */
export function resolveQuietPeriod(project: SchedulableProject): number {
  if (typeof project.getQuietPeriod !== 'function') return 0;
  try {
    const quietPeriod = project.getQuietPeriod();
    return Number.isInteger(quietPeriod) && quietPeriod >= 0 ? quietPeriod : 0;
  } catch (err) {
    warnAccessorFailure(project, 'getQuietPeriod', err);
    return 0;
  }
}

/** Null sends the hook log to the shared root. */
export function resolveRootDir(project: SchedulableProject): string | null {
  if (typeof project.getRootDir !== 'function') return null;
  try {
    const rootDir = project.getRootDir();
    return typeof rootDir === 'string' && rootDir.length > 0 ? rootDir : null;
  } catch (err) {
    warnAccessorFailure(project, 'getRootDir', err);
    return null;
  }
}

export function resolveNextBuildNumber(project: SchedulableProject): number | null {
  if (typeof project.getNextBuildNumber !== 'function') return null;
  try {
    const next = project.getNextBuildNumber();
    return Number.isInteger(next) ? next : null;
  } catch (err) {
    warnAccessorFailure(project, 'getNextBuildNumber', err);
    return null;
  }
}
