import { InvalidOptionArgumentError, type Command } from 'commander';
import type { LogLevel } from '@rigbuild/core/logging';

import type { CliGlobalOptions } from '../../kernel/types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const defaultGlobalOptions: CliGlobalOptions = Object.freeze({
  logFormat: 'pretty',
  logLevel: 'info',
  verbose: false,
} as const);

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const parseLogLevel = (value: string): LogLevel => {
  const normalized = value.trim().toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }

  throw new InvalidOptionArgumentError(
    `Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(', ')}.`,
  );
};

export const registerGlobalOptions = (program: Command): void => {
  program
    .option('--json-logs', 'Emit NDJSON structured logs on stderr.', false)
    .option(
      '--log-level <level>',
      `Lowest structured log level to emit (${LOG_LEVELS.join(', ')}).`,
      parseLogLevel,
      defaultGlobalOptions.logLevel,
    )
    .option('--verbose', 'Print stack traces for unexpected errors.', false);
};

// Read from the root command so subcommands see options given before their name.
export const readGlobalOptions = (program: Command): CliGlobalOptions => {
  const { jsonLogs, logLevel, verbose } = program.opts<{
    jsonLogs?: boolean;
    logLevel?: LogLevel;
    verbose?: boolean;
  }>();

  return {
    logFormat: jsonLogs === true ? 'json' : defaultGlobalOptions.logFormat,
    logLevel: logLevel ?? defaultGlobalOptions.logLevel,
    verbose: verbose ?? defaultGlobalOptions.verbose,
  };
};
