import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { ProjectEntity } from './entities/project.entity';
import { PROJECT_SEED } from './seed/project.seed';

/**
 * Inserts sample projects on startup, only when the projects table is empty
 * and SEED_PROJECTS is not 'false'.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(private readonly dataSource: DataSource) {}

  async onModuleInit(): Promise<void> {
    if (process.env.SEED_PROJECTS === 'false') return;
    await this.seedProjectsIfEmpty();
  }

  private async seedProjectsIfEmpty(): Promise<void> {
    const repo = this.dataSource.getRepository(ProjectEntity);
    const count = await repo.count();
    if (count > 0) return;

    for (const row of PROJECT_SEED) {
      await repo.save(repo.create(row));
    }
    this.logger.log(`Seeded ${PROJECT_SEED.length} projects`);
  }
}
