import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { dispatchConfig } from '../config/dispatch.config';

export type UnitOfWork = () => Promise<unknown> | unknown;

interface PendingUnit {
  key: string | null;
  run: UnitOfWork;
}

export interface DispatchQueueStats {
  pending: number;
  active: number;
  completed: number;
  failed: number;
}

const SHUTDOWN_GRACE_MS = 2000;

/**
 * In-process worker pool for push dispatch.
 * - units start in submission order, at most `concurrency` at a time
 * - units with the same key never overlap and keep their submission order
 * - a throwing unit is logged and counted; there are no retries
 */
@Injectable()
export class DispatchQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(DispatchQueueService.name);
  private readonly pending: PendingUnit[] = [];
  private readonly busyKeys = new Set<string>();
  private readonly concurrency: number;
  private active = 0;
  private completed = 0;
  private failed = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(@Inject(dispatchConfig.KEY) config: ConfigType<typeof dispatchConfig>) {
    this.concurrency = config.concurrency;
  }

  /** Queue a unit of work. Returns immediately; the unit never runs on the caller's stack. */
  submit(run: UnitOfWork, key?: string): void {
    if (this.closed) {
      this.logger.warn('Dispatch queue is shut down; dropping unit of work');
      return;
    }
    this.pending.push({ key: key ?? null, run });
    this.pump();
  }

  stats(): DispatchQueueStats {
    return {
      pending: this.pending.length,
      active: this.active,
      completed: this.completed,
      failed: this.failed,
    };
  }

  /** Resolves once nothing is pending or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async onModuleDestroy(): Promise<void> {
    this.closed = true;
    let endGrace = (): void => {};
    const grace = new Promise<void>((resolve) => {
      endGrace = resolve;
    });
    const timer = setTimeout(() => endGrace(), SHUTDOWN_GRACE_MS);
    try {
      await Promise.race([this.onIdle(), grace]);
    } finally {
      clearTimeout(timer);
    }
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.active === 0;
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const index = this.pending.findIndex((unit) => unit.key === null || !this.busyKeys.has(unit.key));
      if (index === -1) return;
      const [unit] = this.pending.splice(index, 1);
      this.active++;
      if (unit.key !== null) this.busyKeys.add(unit.key);
      void this.execute(unit);
    }
  }

  private async execute(unit: PendingUnit): Promise<void> {
    try {
      // submit() returns before any unit code runs
      await Promise.resolve();
      await unit.run();
      this.completed++;
    } catch (err) {
      this.failed++;
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Dispatch unit${unit.key ? ` for ${unit.key}` : ''} failed: ${message}`);
    } finally {
      this.active--;
      if (unit.key !== null) this.busyKeys.delete(unit.key);
      this.pump();
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
