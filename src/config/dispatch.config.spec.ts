import { resolve } from 'node:path';
import { ConfigurationError, readDispatchConfig } from './dispatch.config';

describe('readDispatchConfig', () => {
  const keys = ['DISPATCH_CONCURRENCY', 'HOST_ROOT_DIR', 'ENABLE_PIPELINE_PROJECTS'];
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of keys) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('falls back to defaults', () => {
    expect(readDispatchConfig()).toEqual({
      concurrency: 2,
      rootDir: resolve('data'),
      pipelineProjects: true,
    });
  });

  it('reads the environment', () => {
    process.env.DISPATCH_CONCURRENCY = '8';
    process.env.HOST_ROOT_DIR = '/srv/dispatch';
    process.env.ENABLE_PIPELINE_PROJECTS = 'false';

    expect(readDispatchConfig()).toEqual({
      concurrency: 8,
      rootDir: '/srv/dispatch',
      pipelineProjects: false,
    });
  });

  it.each(['0', '-1', 'two', '2.5'])('rejects DISPATCH_CONCURRENCY=%s', (value) => {
    process.env.DISPATCH_CONCURRENCY = value;

    expect(() => readDispatchConfig()).toThrow(ConfigurationError);
    expect(() => readDispatchConfig()).toThrow(`Invalid DISPATCH_CONCURRENCY: "${value}"`);
  });
});
