/**
 * A GitBucket push, already parsed from the webhook body by the HTTP layer.
 * The dispatcher only reads it.
 */
export interface PushNotification {
  /** Repository the push went to; null when the payload carried none */
  readonly repository: PushRepository | null;
  /** Full ref, e.g. refs/heads/main */
  readonly ref: string;
  readonly pusher: PushPusher | null;
  /** Head commit of the push */
  readonly lastCommit: PushCommit | null;
  readonly commits?: readonly PushCommit[];
}

export interface PushRepository {
  readonly url: string;
}

export interface PushPusher {
  readonly name: string;
}

export interface PushCommit {
  readonly id: string;
  readonly message: string;
}
