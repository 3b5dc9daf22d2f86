export class HookLogWriteError extends Error {
  constructor(
    readonly logPath: string,
    reason: unknown,
  ) {
    super(`Cannot write hook log ${logPath}: ${reason instanceof Error ? reason.message : String(reason)}`);
    this.name = 'HookLogWriteError';
  }
}

export class HookLogNotFoundError extends Error {
  constructor(readonly logPath: string) {
    super(`Hook log ${logPath} has not been written yet`);
    this.name = 'HookLogNotFoundError';
  }
}
