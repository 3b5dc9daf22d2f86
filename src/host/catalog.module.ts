import { Module } from '@nestjs/common';
import { TriggerModule } from '../trigger/trigger.module';
import { ProjectCatalogService } from './project-catalog.service';

@Module({
  imports: [TriggerModule],
  providers: [ProjectCatalogService],
  exports: [ProjectCatalogService],
})
export class CatalogModule {}
