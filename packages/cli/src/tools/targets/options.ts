import { InvalidOptionArgumentError, Option, type Command } from 'commander';
import { UnsupportedPlatformError, parsePlatform, type Platform } from '@rigbuild/targets';

export type PlanOutputFormat = 'human' | 'json';

export interface PlanCommandOptions {
  readonly config?: string;
  readonly platform?: Platform;
  readonly openblas?: boolean;
  readonly format: PlanOutputFormat;
}

const parsePlatformOption = (value: string): Platform => {
  try {
    return parsePlatform(value);
  } catch (error) {
    if (error instanceof UnsupportedPlatformError) {
      throw new InvalidOptionArgumentError(error.message);
    }
    throw error;
  }
};

export const registerPlanOptions = (command: Command): void => {
  const formatOption = new Option('--format <format>', 'Output format for the build plan')
    .choices(['human', 'json'])
    .default('human');

  command
    .option('-c, --config <path>', 'Path to the rigbuild configuration file')
    .option(
      '-p, --platform <name>',
      'Platform to plan for (defaults to the host)',
      parsePlatformOption,
    )
    .option('--openblas', 'Request the OpenBLAS backend where the platform has no native BLAS')
    .option('--no-openblas', 'Do not request the OpenBLAS backend')
    .addOption(formatOption);
};

const isPlanOutputFormat = (value: unknown): value is PlanOutputFormat =>
  value === 'human' || value === 'json';

export const resolvePlanCommandOptions = (command: Command): PlanCommandOptions => {
  const options = command.opts<{
    config?: string;
    platform?: Platform;
    openblas?: boolean;
    format?: unknown;
  }>();

  return {
    format: isPlanOutputFormat(options.format) ? options.format : 'human',
    ...(options.config === undefined ? {} : { config: options.config }),
    ...(options.platform === undefined ? {} : { platform: options.platform }),
    ...(options.openblas === undefined ? {} : { openblas: options.openblas }),
  } satisfies PlanCommandOptions;
};
