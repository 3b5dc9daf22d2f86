import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import type { TriggerBinding } from '../../trigger/push-trigger.service';
import { PushTriggerService } from '../../trigger/push-trigger.service';
import { GitBucketWebhookController } from './gitbucket-webhook.controller';

describe('GitBucketWebhookController', () => {
  const binding: TriggerBinding = {
    name: 'frontend-app',
    project: { name: 'frontend-app' },
    passThroughGitCommit: false,
  };
  const getBinding = jest.fn();
  const onPushNotification = jest.fn();
  let controller: GitBucketWebhookController;

  beforeEach(async () => {
    getBinding.mockReset();
    onPushNotification.mockReset();
    const moduleRef = await Test.createTestingModule({
      controllers: [GitBucketWebhookController],
      providers: [{ provide: PushTriggerService, useValue: { getBinding, onPushNotification } }],
    }).compile();
    controller = moduleRef.get(GitBucketWebhookController);
  });

  it('hands the push to the bound trigger with absent fields filled in', () => {
    getBinding.mockReturnValue(binding);

    const response = controller.handlePush('frontend-app', {
      repository: null,
      ref: 'refs/heads/main',
      pusher: { name: 'bob' },
      lastCommit: null,
    });

    expect(response).toEqual({ accepted: true, project: 'frontend-app' });
    expect(onPushNotification).toHaveBeenCalledWith(binding, {
      repository: null,
      ref: 'refs/heads/main',
      pusher: { name: 'bob' },
      lastCommit: null,
      commits: [],
    });
  });

  it('rejects pushes for unbound projects', () => {
    getBinding.mockReturnValue(null);

    expect(() =>
      controller.handlePush('ghost', { repository: null, ref: 'refs/heads/main', pusher: null, lastCommit: null }),
    ).toThrow(new NotFoundException('No push trigger bound to project: ghost'));
    expect(onPushNotification).not.toHaveBeenCalled();
  });
});
