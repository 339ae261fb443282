import { loadConfigFile } from '@rigbuild/core/config';
import { z } from 'zod';

import {
  PLATFORMS,
  createPlatformContext,
  detectHostPlatform,
  type Platform,
  type PlatformContext,
} from '../domain/models/platform.js';

export interface BuildConfig {
  readonly platform?: Platform;
  readonly openblas?: boolean;
}

export interface LoadedBuildConfig {
  readonly path: string;
  readonly directory: string;
  readonly config: BuildConfig;
}

export const buildConfigSchema = z
  .object({
    platform: z.enum(PLATFORMS).optional(),
    openblas: z.boolean().optional(),
  })
  .strict();

/**
 * Validates an already loaded configuration value.
 *
 * @throws {z.ZodError} When the value does not match the build configuration shape.
 */
export function parseBuildConfig(value: unknown): BuildConfig {
  const parsed = buildConfigSchema.parse(value);
  return {
    ...(parsed.platform === undefined ? {} : { platform: parsed.platform }),
    ...(parsed.openblas === undefined ? {} : { openblas: parsed.openblas }),
  };
}

/**
 * Loads a rigbuild configuration file, resolves any asynchronous exports, and validates it.
 *
 * @param configPath - Path to the configuration file.
 * @param cwd - Directory a relative `configPath` is resolved against.
 */
export async function loadBuildConfig(
  configPath: string,
  cwd?: string,
): Promise<LoadedBuildConfig> {
  const loaded = await loadConfigFile({
    path: configPath,
    ...(cwd === undefined ? {} : { cwd }),
  });

  return {
    path: loaded.path,
    directory: loaded.directory,
    config: parseBuildConfig(loaded.config),
  };
}

export interface ResolvePlatformContextOptions {
  readonly config?: BuildConfig;
  readonly platform?: Platform;
  readonly openblas?: boolean;
  readonly hostPlatform?: NodeJS.Platform;
}

/**
 * Merges explicit overrides over file configuration. Without a platform from either source the
 * host platform is used.
 */
export function resolvePlatformContext(
  options: ResolvePlatformContextOptions = {},
): PlatformContext {
  const platform =
    options.platform ??
    options.config?.platform ??
    detectHostPlatform(options.hostPlatform ?? process.platform);
  const openblas = options.openblas ?? options.config?.openblas ?? false;
  return createPlatformContext(platform, { openblas });
}
