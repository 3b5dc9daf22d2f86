import type { PushCause } from './push-cause';
import type { PushNotification } from './push-notification';

/** Carries the cause to scheduling operations that only take actions. */
export interface CauseAction {
  readonly kind: 'cause';
  readonly cause: PushCause;
}

/** Pins the build to the pushed commit instead of the branch head at build time. */
export interface RevisionPinAction {
  readonly kind: 'revision';
  readonly commitId: string;
}

export type BuildAction = CauseAction | RevisionPinAction;

/**
 * Actions attached to a scheduling attempt. The cause action always comes first;
 * a revision pin follows only when pass-through is on and the push has a head commit.
 */
export function buildActions(
  notification: PushNotification,
  cause: PushCause,
  passThroughGitCommit: boolean,
): readonly BuildAction[] {
  const actions: BuildAction[] = [{ kind: 'cause', cause }];

  if (passThroughGitCommit && notification.lastCommit) {
    actions.push({ kind: 'revision', commitId: notification.lastCommit.id });
  }

  return actions;
}

export function findCause(actions: readonly BuildAction[]): PushCause | null {
  for (const action of actions) {
    if (action.kind === 'cause') return action.cause;
  }
  return null;
}

export function findRevision(actions: readonly BuildAction[]): string | null {
  for (const action of actions) {
    if (action.kind === 'revision') return action.commitId;
  }
  return null;
}
