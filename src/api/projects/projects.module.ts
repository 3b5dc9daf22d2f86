import { Module } from '@nestjs/common';
import { ProjectsController } from './projects.controller';
import { TriggerModule } from '../../trigger/trigger.module';

@Module({
  imports: [TriggerModule],
  controllers: [ProjectsController],
})
export class ProjectsModule {}
