import { Body, Controller, HttpCode, HttpStatus, NotFoundException, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { PushNotificationDto, toPushNotification } from '../../dto/push-notification.dto';
import { PushTriggerService } from '../../trigger/push-trigger.service';

@Controller('webhooks/gitbucket')
@ApiTags('webhooks')
export class GitBucketWebhookController {
  constructor(private readonly triggers: PushTriggerService) {}

  /**
   * Hand a parsed GitBucket push to the project's trigger.
   * Scheduling happens on the dispatch queue; the response does not wait for it.
   */
  @Post(':project')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Dispatch a GitBucket push to a bound project' })
  @ApiBody({ type: PushNotificationDto })
  handlePush(@Param('project') projectName: string, @Body() body: PushNotificationDto) {
    const binding = this.triggers.getBinding(projectName);
    if (!binding) {
      throw new NotFoundException(`No push trigger bound to project: ${projectName}`);
    }

    this.triggers.onPushNotification(binding, toPushNotification(body));
    return { accepted: true, project: binding.name };
  }
}
