import { Inject, Injectable, Logger, OnApplicationBootstrap, Optional } from '@nestjs/common';
import { mkdir } from 'node:fs/promises';
import { DataSource } from 'typeorm';
import { ProjectEntity } from '../database/entities/project.entity';
import { PIPELINE_PROJECT_VARIANT, SIMPLE_PROJECT_VARIANT } from '../trigger/applicability.service';
import { resolveRootDir } from '../trigger/project';
import { PushTriggerService } from '../trigger/push-trigger.service';
import type { HostProjectVariant } from './project-variant';

/**
 * Binds a push trigger to every project in the `projects` table at startup.
 * Rows whose kind has no installed adapter are skipped.
 */
@Injectable()
export class ProjectCatalogService implements OnApplicationBootstrap {
  private readonly logger = new Logger(ProjectCatalogService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly triggers: PushTriggerService,
    @Inject(SIMPLE_PROJECT_VARIANT) private readonly simpleVariant: HostProjectVariant,
    @Optional() @Inject(PIPELINE_PROJECT_VARIANT) private readonly pipelineVariant?: HostProjectVariant,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.loadBindings();
  }

  /** Returns the number of projects that ended up bound. */
  async loadBindings(): Promise<number> {
    const definitions = await this.dataSource
      .getRepository(ProjectEntity)
      .find({ order: { name: 'ASC' } });

    let bound = 0;
    for (const definition of definitions) {
      const variant = this.variantFor(definition.kind);
      if (!variant) {
        this.logger.warn(`No adapter installed for ${definition.kind} project ${definition.name}; skipping`);
        continue;
      }

      const project = variant.create(definition);
      const rootDir = resolveRootDir(project);
      if (rootDir && !(await this.createRootDir(definition.name, rootDir))) continue;

      const binding = this.triggers.bind(project, {
        passThroughGitCommit: definition.pass_through_git_commit,
      });
      if (binding) bound++;
    }

    this.logger.log(`Bound push triggers for ${bound} of ${definitions.length} projects`);
    return bound;
  }

  private async createRootDir(name: string, rootDir: string): Promise<boolean> {
    try {
      await mkdir(rootDir, { recursive: true });
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Cannot create directory ${rootDir} for ${name}; skipping: ${message}`);
      return false;
    }
  }

  private variantFor(kind: string): HostProjectVariant | null {
    if (this.simpleVariant.kind === kind) return this.simpleVariant;
    if (this.pipelineVariant?.kind === kind) return this.pipelineVariant;
    return null;
  }
}
