import { performance } from 'node:perf_hooks';

import { noopLogger, type StructuredLogger } from '@rigbuild/core/logging';
import {
  InMemoryTargetEventBus,
  type TargetEventBusPort,
  type TargetStage,
} from '@rigbuild/core/runtime';

import type { PlatformContext } from '../domain/models/platform.js';
import type { TargetDescriptor } from '../domain/ports/target-descriptor.js';
import type { TargetHostPort } from '../domain/ports/target-host.js';

export type TargetLifecycleState =
  | 'created'
  | 'dependencies-declared'
  | 'configured'
  | 'packaged'
  | 'done';

const STAGE_TRANSITIONS: Readonly<
  Record<TargetStage, { readonly from: TargetLifecycleState; readonly to: TargetLifecycleState }>
> = Object.freeze({
  dependencies: { from: 'created', to: 'dependencies-declared' },
  configure: { from: 'dependencies-declared', to: 'configured' },
  package: { from: 'configured', to: 'packaged' },
});

export const TARGET_STAGES: readonly TargetStage[] = Object.freeze([
  'dependencies',
  'configure',
  'package',
]);

export class TargetLifecycleError extends Error {
  constructor(
    readonly target: string,
    readonly stage: TargetStage | 'complete',
    readonly state: TargetLifecycleState,
  ) {
    super(`Cannot run ${stage} for target "${target}" while it is ${state}.`);
    this.name = 'TargetLifecycleError';
  }
}

/**
 * Tracks one target through dependencies → configure → package. Stages run once each and only
 * in that order.
 */
export class TargetLifecycle {
  private current: TargetLifecycleState = 'created';

  constructor(
    private readonly descriptor: TargetDescriptor,
    private readonly context: PlatformContext,
    private readonly host: TargetHostPort,
  ) {}

  get state(): TargetLifecycleState {
    return this.current;
  }

  get target(): string {
    return this.descriptor.name;
  }

  run(stage: TargetStage): void {
    const transition = STAGE_TRANSITIONS[stage];
    if (this.current !== transition.from) {
      throw new TargetLifecycleError(this.descriptor.name, stage, this.current);
    }

    switch (stage) {
      case 'dependencies': {
        this.descriptor.dependencies(this.host);
        break;
      }
      case 'configure': {
        this.descriptor.configure(this.context, this.host);
        break;
      }
      case 'package': {
        this.descriptor.package(this.context, this.host);
        break;
      }
      default: {
        const unreachable: never = stage;
        throw new Error(`Unsupported target stage ${String(unreachable)}`);
      }
    }

    this.current = transition.to;
  }

  complete(): void {
    if (this.current !== 'packaged') {
      throw new TargetLifecycleError(this.descriptor.name, 'complete', this.current);
    }
    this.current = 'done';
  }
}

export interface RunTargetLifecycleOptions {
  readonly descriptor: TargetDescriptor;
  readonly context: PlatformContext;
  readonly host: TargetHostPort;
  readonly eventBus?: TargetEventBusPort;
  readonly logger?: StructuredLogger;
  readonly timer?: { now(): number };
  readonly clock?: () => Date;
}

/**
 * Drives a target through every lifecycle stage, publishing stage events as it goes.
 *
 * @returns The finished lifecycle, in the `done` state.
 * @throws The first error raised by a stage, after its `stage:error` event is published.
 */
export async function runTargetLifecycle(
  options: RunTargetLifecycleOptions,
): Promise<TargetLifecycle> {
  const { descriptor, context, host } = options;
  const eventBus = options.eventBus ?? new InMemoryTargetEventBus();
  const logger = options.logger ?? noopLogger;
  const timer = options.timer ?? { now: () => performance.now() };
  const clock = options.clock ?? (() => new Date());
  const lifecycle = new TargetLifecycle(descriptor, context, host);

  logger.log({
    level: 'debug',
    name: 'target-lifecycle',
    event: 'target.lifecycle.begin',
    context: { target: descriptor.name },
    data: { platform: context.platform, openblas: context.openblas },
  });

  for (const stage of TARGET_STAGES) {
    await eventBus.publish({
      type: 'stage:start',
      payload: { target: descriptor.name, stage, timestamp: clock() },
    });

    const start = timer.now();
    try {
      lifecycle.run(stage);
    } catch (error) {
      await eventBus.publish({
        type: 'stage:error',
        payload: { target: descriptor.name, stage, timestamp: clock(), error },
      });
      throw error;
    }

    await eventBus.publish({
      type: 'stage:complete',
      payload: {
        target: descriptor.name,
        stage,
        timestamp: clock(),
        attributes: { durationMs: timer.now() - start },
      },
    });
  }

  lifecycle.complete();
  return lifecycle;
}
