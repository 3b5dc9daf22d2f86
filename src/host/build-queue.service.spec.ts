import { Test } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import type { BuildAction } from '../trigger/build-action';
import { PushCause } from '../trigger/push-cause';
import { BuildQueueService } from './build-queue.service';

const BOB_CAUSE_JSON =
  '{"type":"gitbucket-push","pushedBy":"bob","description":"Started by GitBucket push by bob"}';

describe('BuildQueueService', () => {
  let query: jest.Mock;
  let find: jest.Mock;
  let buildQueue: BuildQueueService;

  beforeEach(async () => {
    query = jest.fn();
    find = jest.fn().mockResolvedValue([]);
    const moduleRef = await Test.createTestingModule({
      providers: [
        BuildQueueService,
        { provide: DataSource, useValue: { query, getRepository: () => ({ find }) } },
      ],
    }).compile();
    buildQueue = moduleRef.get(BuildQueueService);
  });

  it('inserts a waiting build pinned to the pushed revision', async () => {
    const cause = new PushCause('bob');
    const actions: BuildAction[] = [
      { kind: 'cause', cause },
      { kind: 'revision', commitId: 'deadbeef' },
    ];
    query.mockResolvedValue([
      {
        id: 'b1',
        project_name: 'demo',
        cause: { type: 'gitbucket-push', pushedBy: 'bob' },
        revision: 'deadbeef',
        quiet_period: 5,
        not_before: new Date('2026-01-01T00:00:05.000Z'),
        status: 'waiting',
        created_at: '2026-01-01T00:00:00.000Z',
      },
    ]);

    const queued = await buildQueue.enqueue('demo', 5, actions);

    expect(query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO build_queue'), [
      'demo',
      BOB_CAUSE_JSON,
      'deadbeef',
      5,
    ]);
    expect(queued).toEqual({
      id: 'b1',
      project_name: 'demo',
      cause: { type: 'gitbucket-push', pushedBy: 'bob' },
      revision: 'deadbeef',
      quiet_period: 5,
      not_before: new Date('2026-01-01T00:00:05.000Z'),
      status: 'waiting',
      created_at: new Date('2026-01-01T00:00:00.000Z'),
    });
  });

  it('returns null when an identical build is already waiting', async () => {
    query.mockResolvedValue([]);

    const queued = await buildQueue.enqueue('demo', 0, [{ kind: 'cause', cause: new PushCause('bob') }]);

    expect(queued).toBeNull();
  });

  it('schedules fallback builds by project name without a revision', async () => {
    query.mockResolvedValue([]);

    await buildQueue.schedule({ name: 'docs' }, 0, [{ kind: 'cause', cause: new PushCause('bob') }]);

    expect(query).toHaveBeenCalledWith(expect.any(String), ['docs', BOB_CAUSE_JSON, null, 0]);
  });

  it('prefers an explicit cause over the one in the actions', async () => {
    query.mockResolvedValue([]);

    await buildQueue.enqueue('demo', 0, [], new PushCause('bob'));

    expect(query).toHaveBeenCalledWith(expect.any(String), ['demo', BOB_CAUSE_JSON, null, 0]);
  });

  it('lists waiting builds oldest first', async () => {
    await buildQueue.listWaiting('demo');

    expect(find).toHaveBeenCalledWith({
      where: { project_name: 'demo', status: 'waiting' },
      order: { created_at: 'ASC' },
    });
  });
});
