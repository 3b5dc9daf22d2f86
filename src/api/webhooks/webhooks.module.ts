import { Module } from '@nestjs/common';
import { GitBucketWebhookController } from './gitbucket-webhook.controller';
import { TriggerModule } from '../../trigger/trigger.module';

@Module({
  imports: [TriggerModule],
  controllers: [GitBucketWebhookController],
})
export class WebhooksModule {}
