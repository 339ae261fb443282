import { createManifest, type PackageManifest } from '@rigbuild/core';

export {
  PLATFORMS,
  UnsupportedPlatformError,
  createPlatformContext,
  detectHostPlatform,
  isApple,
  isIos,
  isLinux,
  isMacOs,
  isPlatform,
  parsePlatform,
  wantsOpenBlas,
  type Platform,
  type PlatformContext,
} from './domain/models/platform.js';
export type {
  ProductInjection,
  TargetConfigurationPlan,
  TargetPackagingPlan,
} from './domain/models/plans.js';
export type { TargetDescriptor, TargetHostPort } from './domain/ports/index.js';
export {
  InvalidCMakeOptionError,
  findConflictingOptions,
  parseCMakeOption,
  renderCMakeArguments,
  type CMakeOption,
  type CMakeOptionConflict,
} from './domain/services/cmake-options.js';

export {
  RecordingTargetHost,
  type RecordingTargetHostOptions,
  type TargetBuildRecord,
} from './infrastructure/recording-target-host.js';

export {
  TARGET_STAGES,
  TargetLifecycle,
  TargetLifecycleError,
  runTargetLifecycle,
  type RunTargetLifecycleOptions,
  type TargetLifecycleState,
} from './application/target-lifecycle.js';
export {
  DuplicateTargetError,
  TargetRegistry,
  UnknownTargetError,
  createDefaultTargetRegistry,
} from './application/target-registry.js';
export {
  ConflictingOptionsError,
  planTarget,
  type PlanTargetOptions,
  type TargetBuildPlan,
} from './application/plan-target.js';

export * from './config/index.js';
export { createTargetStageLoggingSubscriber } from './logging/index.js';
export * from './targets/dlib/index.js';

const manifestDefinition = {
  name: '@rigbuild/targets',
  summary: 'Target descriptors for external native libraries and the lifecycle that drives them.',
} as const satisfies PackageManifest;

export const manifest = createManifest(manifestDefinition);
