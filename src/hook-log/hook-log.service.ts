import { Injectable } from '@nestjs/common';
import { readFile, writeFile } from 'node:fs/promises';
import type { PushNotification } from '../trigger/push-notification';
import { HookLogNotFoundError, HookLogWriteError } from './hook-log.errors';

export const HOOK_LOG_FILE_NAME = 'gitbucket-polling.log';

/**
 * Renders the hook log entry for one notification. Optional fields are skipped,
 * every line ends with a newline.
 */
export function formatHookLogEntry(notification: PushNotification, startedOn: Date): string {
  const lines = [
    `Started on ${startedOn.toISOString()}`,
    `GitBucket push webhook received from repository: ${notification.repository?.url ?? 'unknown'}`,
  ];
  if (notification.pusher) {
    lines.push(`Pushed by: ${notification.pusher.name}`);
  }
  lines.push(`Branch: ${notification.ref}`);
  if (notification.lastCommit) {
    lines.push(`Last commit: ${notification.lastCommit.id}`);
    lines.push(`Commit message: ${notification.lastCommit.message}`);
  }
  return lines.map((line) => `${line}\n`).join('');
}

// fs errors can come from another realm (Jest's vm context), so match by shape
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Per-project hook log. The file only ever holds the latest notification:
 * each write replaces it. Callers serialize writers per path.
 */
@Injectable()
export class HookLogService {
  async write(logPath: string, notification: PushNotification, startedOn = new Date()): Promise<void> {
    try {
      await writeFile(logPath, formatHookLogEntry(notification, startedOn), { encoding: 'utf8' });
    } catch (err) {
      throw new HookLogWriteError(logPath, err);
    }
  }

  /** Contents of the hook log; HookLogNotFoundError until the first push is written. */
  async read(logPath: string): Promise<string> {
    try {
      return await readFile(logPath, { encoding: 'utf8' });
    } catch (err) {
      if (isMissingFile(err)) throw new HookLogNotFoundError(logPath);
      throw err;
    }
  }
}
