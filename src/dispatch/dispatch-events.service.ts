import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import type { ScheduleOutcome } from '../trigger/scheduling-negotiator.service';

export type DispatchStatus = 'scheduled' | 'not-scheduled' | 'configuration-absent';

/** One finished unit of work. */
export interface DispatchEvent {
  project: string;
  ref: string;
  status: DispatchStatus;
  outcome: ScheduleOutcome | null;
  hookLogWritten: boolean;
  finishedAt: string;
}

/**
 * In-process feed of dispatch results, consumed by the SSE endpoint.
 */
@Injectable()
export class DispatchEventsService implements OnModuleDestroy {
  private readonly subject = new Subject<DispatchEvent>();

  publish(event: DispatchEvent): void {
    this.subject.next(event);
  }

  getEvents(): Observable<DispatchEvent> {
    return this.subject.asObservable();
  }

  getEventsForProject(project: string): Observable<DispatchEvent> {
    return this.subject.pipe(filter((event) => event.project === project));
  }

  onModuleDestroy(): void {
    this.subject.complete();
  }
}
