import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { dispatchConfig, readDispatchConfig } from './config/dispatch.config';
import { DatabaseModule } from './database/database.module';
import { HostModule } from './host/host.module';
import { CatalogModule } from './host/catalog.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { ProjectsModule } from './api/projects/projects.module';
import { DispatchApiModule } from './api/dispatch/dispatch-api.module';
import { StreamingModule } from './streaming/streaming.module';

@Module({
  imports: [
    // must stay first: it loads .env before the options below are read
    ConfigModule.forRoot({ isGlobal: true, load: [dispatchConfig] }),
    DatabaseModule,
    HostModule.register({ pipelineProjects: readDispatchConfig().pipelineProjects }),
    CatalogModule,
    WebhooksModule,
    ProjectsModule,
    DispatchApiModule,
    StreamingModule,
  ],
})
export class AppModule {}
