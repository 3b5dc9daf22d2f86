import type { PushNotification } from './push-notification';

/**
 * Why a build ran: a GitBucket push, optionally attributed to the pusher.
 * The host compares causes with equals() to fold duplicate queue entries.
 */
export class PushCause {
  constructor(readonly pushedBy: string | null) {}

  get shortDescription(): string {
    if (this.pushedBy === null) return 'Started by GitBucket push';
    return `Started by GitBucket push by ${this.pushedBy}`;
  }

  equals(other: unknown): boolean {
    return other instanceof PushCause && other.pushedBy === this.pushedBy;
  }

  toJSON(): { type: 'gitbucket-push'; pushedBy: string | null; description: string } {
    return { type: 'gitbucket-push', pushedBy: this.pushedBy, description: this.shortDescription };
  }
}

export function buildCause(notification: PushNotification): PushCause {
  return new PushCause(notification.pusher?.name ?? null);
}
