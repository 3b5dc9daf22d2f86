import { Controller, Param, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { DispatchEvent, DispatchEventsService } from '../dispatch/dispatch-events.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly events: DispatchEventsService) {}

  /**
   * SSE endpoint for dispatch results of every project.
   */
  @Sse('dispatches')
  @ApiOperation({ summary: 'SSE: dispatch results for all projects' })
  streamAllDispatches(): Observable<{ data: DispatchEvent }> {
    return this.events.getEvents().pipe(map((event) => ({ data: event })));
  }

  /**
   * GET /stream/dispatches/:project - results for one project only.
   */
  @Sse('dispatches/:project')
  @ApiOperation({ summary: 'SSE: dispatch results for a project' })
  streamProjectDispatches(@Param('project') project: string): Observable<{ data: DispatchEvent }> {
    return this.events.getEventsForProject(project).pipe(map((event) => ({ data: event })));
  }
}
