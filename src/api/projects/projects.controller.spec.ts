import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { HookLogNotFoundError } from '../../hook-log/hook-log.errors';
import type { TriggerBinding } from '../../trigger/push-trigger.service';
import { PushTriggerService } from '../../trigger/push-trigger.service';
import { ProjectsController } from './projects.controller';

describe('ProjectsController', () => {
  const binding: TriggerBinding = { name: 'docs', project: { name: 'docs' }, passThroughGitCommit: true };
  const triggers = {
    listBindings: jest.fn(() => [binding]),
    getBinding: jest.fn(),
    getLogFile: jest.fn(() => '/srv/dispatch/jobs/docs/gitbucket-polling.log'),
    readHookLog: jest.fn(),
  };
  let controller: ProjectsController;

  beforeEach(async () => {
    triggers.getBinding.mockReset();
    triggers.readHookLog.mockReset();
    const moduleRef = await Test.createTestingModule({
      controllers: [ProjectsController],
      providers: [{ provide: PushTriggerService, useValue: triggers }],
    }).compile();
    controller = moduleRef.get(ProjectsController);
  });

  it('lists bound projects with their hook log path', () => {
    expect(controller.list()).toEqual([
      {
        name: 'docs',
        passThroughGitCommit: true,
        hookLog: '/srv/dispatch/jobs/docs/gitbucket-polling.log',
      },
    ]);
  });

  it('returns the latest hook log entry', async () => {
    triggers.getBinding.mockReturnValue(binding);
    triggers.readHookLog.mockResolvedValue('Branch: refs/heads/main\n');

    await expect(controller.hookLog('docs')).resolves.toBe('Branch: refs/heads/main\n');
  });

  it('answers 404 before the first push', async () => {
    triggers.getBinding.mockReturnValue(binding);
    triggers.readHookLog.mockRejectedValue(new HookLogNotFoundError('/srv/dispatch/jobs/docs/gitbucket-polling.log'));

    await expect(controller.hookLog('docs')).rejects.toThrow(
      new NotFoundException('No push received yet for project: docs'),
    );
  });

  it('answers 404 for unbound projects', async () => {
    triggers.getBinding.mockReturnValue(null);

    await expect(controller.hookLog('ghost')).rejects.toThrow(
      new NotFoundException('No push trigger bound to project: ghost'),
    );
  });
});
