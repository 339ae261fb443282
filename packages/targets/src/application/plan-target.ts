import type { StructuredLogger } from '@rigbuild/core/logging';
import type { TargetEventBusPort } from '@rigbuild/core/runtime';

import type { PlatformContext } from '../domain/models/platform.js';
import {
  findConflictingOptions,
  renderCMakeArguments,
  type CMakeOptionConflict,
} from '../domain/services/cmake-options.js';
import {
  RecordingTargetHost,
  type RecordingTargetHostOptions,
  type TargetBuildRecord,
} from '../infrastructure/recording-target-host.js';
import { runTargetLifecycle } from './target-lifecycle.js';
import type { TargetRegistry } from './target-registry.js';

export interface TargetBuildPlan extends TargetBuildRecord {
  readonly context: PlatformContext;
  readonly cmakeArguments: readonly string[];
}

export class ConflictingOptionsError extends Error {
  constructor(
    readonly target: string,
    readonly conflicts: readonly CMakeOptionConflict[],
  ) {
    super(
      `Target "${target}" produced conflicting options: ${conflicts
        .map((conflict) => `${conflict.key}=${conflict.values.join('|')}`)
        .join(', ')}.`,
    );
    this.name = 'ConflictingOptionsError';
  }
}

export interface PlanTargetOptions extends RecordingTargetHostOptions {
  readonly registry: TargetRegistry;
  readonly target: string;
  readonly context: PlatformContext;
  readonly eventBus?: TargetEventBusPort;
  readonly logger?: StructuredLogger;
}

/**
 * Runs a registered target's lifecycle against a recording host and returns what it asked for.
 *
 * @throws {UnknownTargetError} When the target is not registered.
 * @throws {ConflictingOptionsError} When an option key was given two different values.
 */
export async function planTarget(options: PlanTargetOptions): Promise<TargetBuildPlan> {
  const descriptor = options.registry.resolve(options.target);
  const host = new RecordingTargetHost(descriptor.name, {
    ...(options.packager ? { packager: options.packager } : {}),
  });

  await runTargetLifecycle({
    descriptor,
    context: options.context,
    host,
    ...(options.eventBus ? { eventBus: options.eventBus } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
  });

  const record = host.snapshot();
  const conflicts = findConflictingOptions(record.options);
  if (conflicts.length > 0) {
    throw new ConflictingOptionsError(descriptor.name, conflicts);
  }

  return Object.freeze({
    ...record,
    context: options.context,
    cmakeArguments: Object.freeze(renderCMakeArguments(record.options)),
  });
}
