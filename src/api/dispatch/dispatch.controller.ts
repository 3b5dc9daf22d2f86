import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { DispatchQueueService } from '../../dispatch/dispatch-queue.service';

@ApiTags('dispatch')
@Controller('dispatch')
export class DispatchController {
  constructor(private readonly dispatchQueue: DispatchQueueService) {}

  @Get('stats')
  @ApiOperation({ summary: 'Dispatch queue counters' })
  stats() {
    return this.dispatchQueue.stats();
  }
}
