import { registerAs } from '@nestjs/config';
import { resolve } from 'node:path';

/**
 * Raised at startup when an environment variable holds an unusable value.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly key?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface DispatchConfig {
  /** Size of the shared dispatch worker pool */
  concurrency: number;
  /** Default hook log root, and parent of per-project directories */
  rootDir: string;
  /** Install the pipeline project adapter */
  pipelineProjects: boolean;
}

function parsePositiveInt(key: string, fallback: string): number {
  const raw = process.env[key] ?? fallback;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new ConfigurationError(`Invalid ${key}: "${raw}"`, key);
  }
  return value;
}

export function readDispatchConfig(): DispatchConfig {
  return {
    concurrency: parsePositiveInt('DISPATCH_CONCURRENCY', '2'),
    rootDir: resolve(process.env.HOST_ROOT_DIR || 'data'),
    pipelineProjects: process.env.ENABLE_PIPELINE_PROJECTS !== 'false',
  };
}

export const dispatchConfig = registerAs('dispatch', readDispatchConfig);
