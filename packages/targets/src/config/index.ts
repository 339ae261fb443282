export {
  buildConfigSchema,
  loadBuildConfig,
  parseBuildConfig,
  resolvePlatformContext,
  type BuildConfig,
  type LoadedBuildConfig,
  type ResolvePlatformContextOptions,
} from './build-config.js';
