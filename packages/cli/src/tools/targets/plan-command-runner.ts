import process from 'node:process';

import type { Command } from 'commander';
import { ConfigFileNotFoundError, findConfigFile } from '@rigbuild/core/config';
import { JsonLineLogger, noopLogger, type StructuredLogger } from '@rigbuild/core/logging';
import { InMemoryTargetEventBus } from '@rigbuild/core/runtime';
import {
  ConflictingOptionsError,
  UnknownTargetError,
  UnsupportedPlatformError,
  createTargetStageLoggingSubscriber,
  loadBuildConfig,
  planTarget,
  resolvePlatformContext,
  type BuildConfig,
  type TargetRegistry,
} from '@rigbuild/targets';

import type { CliIo } from '../../io/cli-io.js';
import type { CliGlobalOptions } from '../../kernel/types.js';
import { resolvePlanCommandOptions } from './options.js';
import { formatBuildPlan } from './plan-reporter.js';

export interface ExecuteTargetsPlanCommandOptions {
  readonly target: string;
  readonly command: Command;
  readonly io: CliIo;
  readonly globalOptions: CliGlobalOptions;
  readonly registry: TargetRegistry;
  readonly cwd?: string;
  readonly hostPlatform?: NodeJS.Platform;
}

export const createCliLogger = (globalOptions: CliGlobalOptions, io: CliIo): StructuredLogger =>
  globalOptions.logFormat === 'json'
    ? new JsonLineLogger(
        { write: (line: string) => io.writeErr(line) },
        { minimumLevel: globalOptions.logLevel },
      )
    : noopLogger;

const loadConfiguration = async (
  configPath: string | undefined,
  cwd: string,
  logger: StructuredLogger,
): Promise<BuildConfig | undefined> => {
  const resolvedPath = configPath ?? (await findConfigFile({ cwd }));
  if (resolvedPath === undefined) {
    return undefined;
  }

  const loaded = await loadBuildConfig(resolvedPath, cwd);
  logger.log({
    level: 'debug',
    name: 'rigbuild-cli',
    event: 'config.loaded',
    data: { path: loaded.path },
  });
  return loaded.config;
};

// Errors caused by user input print as a bare message; anything else reaches the kernel.
const isReportableError = (error: unknown): error is Error =>
  error instanceof ConfigFileNotFoundError ||
  error instanceof UnknownTargetError ||
  error instanceof UnsupportedPlatformError ||
  error instanceof ConflictingOptionsError;

export const executeTargetsPlanCommand = async ({
  target,
  command,
  io,
  globalOptions,
  registry,
  cwd = process.cwd(),
  hostPlatform,
}: ExecuteTargetsPlanCommandOptions): Promise<void> => {
  const options = resolvePlanCommandOptions(command);
  const logger = createCliLogger(globalOptions, io);
  const eventBus = new InMemoryTargetEventBus();
  const unsubscribe = eventBus.subscribe(createTargetStageLoggingSubscriber(logger));

  try {
    const config = await loadConfiguration(options.config, cwd, logger);
    const context = resolvePlatformContext({
      ...(config === undefined ? {} : { config }),
      ...(options.platform === undefined ? {} : { platform: options.platform }),
      ...(options.openblas === undefined ? {} : { openblas: options.openblas }),
      ...(hostPlatform === undefined ? {} : { hostPlatform }),
    });
    const plan = await planTarget({ registry, target, context, eventBus, logger });
    io.writeOut(formatBuildPlan(plan, options.format));
  } catch (error) {
    if (!isReportableError(error)) {
      throw error;
    }
    io.writeErr(`${error.message}\n`);
    process.exitCode = 1;
  } finally {
    unsubscribe();
  }
};
