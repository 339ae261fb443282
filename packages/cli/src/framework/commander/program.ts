import { Command } from 'commander';

import type { CliIo } from '../../io/cli-io.js';
import { registerGlobalOptions } from './global-options.js';

export interface CommanderProgramOptions {
  readonly name: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly examples?: readonly string[] | undefined;
  readonly io: CliIo;
}

/**
 * Creates the root command. Output goes through the supplied IO and commander never exits the
 * process itself; the kernel turns its errors into exit codes.
 */
export const createCommanderProgram = (options: CommanderProgramOptions): Command => {
  const program = new Command(options.name);

  program
    .configureHelp({ sortOptions: true, sortSubcommands: true })
    .description(options.description ?? '')
    .version(options.version, '-v, --version', 'Print the rigbuild version.')
    .configureOutput({
      writeOut: (str: string) => options.io.writeOut(str),
      writeErr: (str: string) => options.io.writeErr(str),
      outputError: (str: string) => options.io.writeErr(str),
    })
    .enablePositionalOptions()
    .showHelpAfterError('(add --help for usage information)');

  if (options.examples && options.examples.length > 0) {
    const lines = options.examples.map((example) => `  $ ${example}`);
    program.addHelpText('after', `\nExamples:\n${lines.join('\n')}\n`);
  }

  registerGlobalOptions(program);
  program.exitOverride();

  return program;
};
