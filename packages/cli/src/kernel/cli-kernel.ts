import process from 'node:process';

import { CommanderError } from 'commander';

import { createCommanderProgram } from '../framework/commander/program.js';
import { readGlobalOptions } from '../framework/commander/global-options.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type { CliCommandModule, CliKernel, CliKernelContext, CliKernelOptions } from './types.js';

export class DuplicateCommandModuleError extends Error {
  constructor(readonly moduleId: string) {
    super(`Command module "${moduleId}" is already registered.`);
    this.name = 'DuplicateCommandModuleError';
  }
}

export type RunOutcome =
  | { readonly kind: 'completed' }
  | { readonly kind: 'commander'; readonly exitCode: number }
  | { readonly kind: 'failed' };

/**
 * A failure a command recorded on `process.exitCode` takes precedence over the outcome of the
 * parse itself.
 */
export const resolveExitCode = (outcome: RunOutcome, recorded: unknown): number => {
  if (typeof recorded === 'number' && recorded !== 0) {
    return recorded;
  }
  switch (outcome.kind) {
    case 'completed': {
      return 0;
    }
    case 'commander': {
      return outcome.exitCode;
    }
    case 'failed': {
      return 1;
    }
  }
};

export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createCommanderProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    examples: options.examples,
    io,
  });
  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => readGlobalOptions(program),
  };
  const moduleIds = new Set<string>();

  const execute = async (argv: readonly string[]): Promise<RunOutcome> => {
    try {
      if (argv.length === 0) {
        throw new Error('Argument vector must include at least the node executable.');
      }
      await program.parseAsync([...argv], { from: 'node' });
      return { kind: 'completed' };
    } catch (error) {
      if (error instanceof CommanderError) {
        return { kind: 'commander', exitCode: error.exitCode };
      }
      const message = formatCliError(error, { verbose: context.getGlobalOptions().verbose });
      io.writeErr(message.endsWith('\n') ? message : `${message}\n`);
      return { kind: 'failed' };
    }
  };

  return {
    register(module: CliCommandModule): CliKernel {
      if (moduleIds.has(module.id)) {
        throw new DuplicateCommandModuleError(module.id);
      }
      moduleIds.add(module.id);
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      const previousExitCode = process.exitCode;
      try {
        const outcome = await execute(argv);
        return resolveExitCode(outcome, process.exitCode);
      } finally {
        process.exitCode = previousExitCode;
      }
    },
  };
};
