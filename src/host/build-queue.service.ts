import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { QueuedBuild } from '../database/entities/queued-build.entity';
import { BuildAction, findCause, findRevision } from '../trigger/build-action';
import type { PushCause } from '../trigger/push-cause';
import type { BuildQueue, SchedulableProject } from '../trigger/project';

/**
 * Host build queue in postgres (build_queue table).
 * A project has at most one waiting build per revision: enqueueing a duplicate
 * is declined and returns null, the way a queue folds identical items.
 */
@Injectable()
export class BuildQueueService implements BuildQueue {
  constructor(private readonly dataSource: DataSource) {}

  /**
   * Insert a waiting build unless an identical one is already waiting.
   * The cause defaults to the one carried in the actions.
   */
  async enqueue(
    projectName: string,
    quietPeriod: number,
    actions: readonly BuildAction[],
    cause: PushCause | null = findCause(actions),
  ): Promise<QueuedBuild | null> {
    const result: Array<Record<string, unknown>> = await this.dataSource.query(
      `
      INSERT INTO build_queue (project_name, cause, revision, quiet_period, not_before, status)
      SELECT $1::varchar, $2::jsonb, $3::varchar, $4::int, NOW() + ($4::int * INTERVAL '1 second'), 'waiting'
      WHERE NOT EXISTS (
        SELECT 1 FROM build_queue
        WHERE project_name = $1::varchar
          AND status = 'waiting'
          AND revision IS NOT DISTINCT FROM $3::varchar
      )
      RETURNING *
      `,
      [projectName, cause ? JSON.stringify(cause) : null, findRevision(actions), quietPeriod],
    );
    const row = result[0] ?? null;
    return row ? this.mapRow(row) : null;
  }

  /** Queue fallback for projects without their own scheduling operation. */
  schedule(
    project: SchedulableProject,
    quietPeriod: number,
    actions: readonly BuildAction[],
  ): Promise<QueuedBuild | null> {
    return this.enqueue(project.name, quietPeriod, actions);
  }

  async listWaiting(projectName: string): Promise<QueuedBuild[]> {
    return this.dataSource.getRepository(QueuedBuild).find({
      where: { project_name: projectName, status: 'waiting' },
      order: { created_at: 'ASC' },
    });
  }

  private mapRow(row: Record<string, unknown>): QueuedBuild {
    const cause = row.cause;
    return {
      id: String(row.id),
      project_name: String(row.project_name),
      cause: cause !== null && typeof cause === 'object' ? { ...cause } : null,
      revision: typeof row.revision === 'string' ? row.revision : null,
      quiet_period: Number(row.quiet_period ?? 0),
      not_before: toDate(row.not_before),
      status: String(row.status ?? 'waiting'),
      created_at: toDate(row.created_at),
    };
  }
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}
