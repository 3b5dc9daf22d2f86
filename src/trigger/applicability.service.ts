import { Inject, Injectable, Optional } from '@nestjs/common';

/** A family of host projects the push trigger knows how to attach to. */
export interface ProjectVariant {
  readonly kind: string;
  matches(target: unknown): boolean;
}

export const SIMPLE_PROJECT_VARIANT = Symbol('SIMPLE_PROJECT_VARIANT');
/** Registered only when the pipeline adapter module is installed. */
export const PIPELINE_PROJECT_VARIANT = Symbol('PIPELINE_PROJECT_VARIANT');

/**
 * Decides whether a push trigger may be bound to a target. Checked once per binding.
 */
@Injectable()
export class ApplicabilityService {
  constructor(
    @Inject(SIMPLE_PROJECT_VARIANT) private readonly simpleVariant: ProjectVariant,
    @Optional() @Inject(PIPELINE_PROJECT_VARIANT) private readonly pipelineVariant?: ProjectVariant,
  ) {}

  isApplicable(target: unknown): boolean {
    if (this.simpleVariant.matches(target)) return true;
    return this.pipelineVariant?.matches(target) ?? false;
  }

  installedKinds(): string[] {
    return this.pipelineVariant
      ? [this.simpleVariant.kind, this.pipelineVariant.kind]
      : [this.simpleVariant.kind];
  }
}
