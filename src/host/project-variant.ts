import type { ProjectEntity } from '../database/entities/project.entity';
import type { ProjectVariant } from '../trigger/applicability.service';
import type { SchedulableProject } from '../trigger/project';

/** A project variant the host can also build from a `projects` row. */
export interface HostProjectVariant extends ProjectVariant {
  create(definition: ProjectEntity): SchedulableProject;
}
