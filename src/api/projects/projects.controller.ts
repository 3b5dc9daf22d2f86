import { Controller, Get, Header, NotFoundException, Param } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { HookLogNotFoundError } from '../../hook-log/hook-log.errors';
import { PushTriggerService } from '../../trigger/push-trigger.service';

@ApiTags('projects')
@Controller('projects')
export class ProjectsController {
  constructor(private readonly triggers: PushTriggerService) {}

  @Get()
  @ApiOperation({ summary: 'List projects with a bound push trigger' })
  list() {
    return this.triggers.listBindings().map((binding) => ({
      name: binding.name,
      passThroughGitCommit: binding.passThroughGitCommit,
      hookLog: this.triggers.getLogFile(binding),
    }));
  }

  @Get(':project/hook-log')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @ApiOperation({ summary: 'Hook log of the most recent push for a project' })
  async hookLog(@Param('project') projectName: string): Promise<string> {
    const binding = this.triggers.getBinding(projectName);
    if (!binding) throw new NotFoundException(`No push trigger bound to project: ${projectName}`);

    try {
      return await this.triggers.readHookLog(binding);
    } catch (err) {
      if (err instanceof HookLogNotFoundError) {
        throw new NotFoundException(`No push received yet for project: ${projectName}`);
      }
      throw err;
    }
  }
}
