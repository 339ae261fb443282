import type { StructuredLogger } from '@rigbuild/core/logging';
import { createTargetEventLogger, type TargetEventListener } from '@rigbuild/core/runtime';

/**
 * Creates a logging subscriber that records target lifecycle stages under the `rigbuild-targets`
 * scope.
 */
export function createTargetStageLoggingSubscriber(logger: StructuredLogger): TargetEventListener {
  return createTargetEventLogger({
    logger,
    scope: 'rigbuild-targets',
    eventPrefix: 'target.stage',
  });
}
