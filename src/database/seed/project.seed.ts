import { ProjectEntity } from '../entities/project.entity';

/**
 * Sample projects inserted on first start when the projects table is empty.
 */
export const PROJECT_SEED: Partial<ProjectEntity>[] = [
  {
    name: 'frontend-app',
    repository: 'https://gitbucket.example.com/example/frontend-app.git',
    kind: 'freestyle',
    quiet_period: 5,
    pass_through_git_commit: true,
  },
  {
    name: 'backend-api',
    repository: 'https://gitbucket.example.com/example/backend-api.git',
    kind: 'pipeline',
    quiet_period: 0,
    pass_through_git_commit: true,
  },
  {
    name: 'docs',
    repository: 'https://gitbucket.example.com/example/docs.git',
    kind: 'freestyle',
    quiet_period: 0,
    pass_through_git_commit: false,
  },
];
