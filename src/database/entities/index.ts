/**
 * Database entities: projects, build_queue.
 */
export { ProjectEntity } from './project.entity';
export type { ProjectKind } from './project.entity';
export { QueuedBuild } from './queued-build.entity';
