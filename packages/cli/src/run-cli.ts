import process from 'node:process';

import { createProcessCliIo } from './io/process-cli-io.js';
import { createCliKernel } from './kernel/cli-kernel.js';
import type { CliKernel } from './kernel/types.js';
import type { CliIo } from './io/cli-io.js';
import {
  createTargetsCommandModule,
  type TargetsCommandModuleOptions,
} from './tools/targets/targets-command-module.js';

export interface CreateRigbuildCliKernelOptions extends TargetsCommandModuleOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

const EXAMPLES = Object.freeze([
  'rigbuild targets list',
  'rigbuild targets plan dlib --platform linux --openblas',
  'rigbuild targets plan dlib --platform macos --format json',
]);

export const createRigbuildCliKernel = ({
  programName,
  version,
  description,
  io,
  ...moduleOptions
}: CreateRigbuildCliKernelOptions): CliKernel => {
  const kernel = createCliKernel({ programName, version, description, io, examples: EXAMPLES });
  kernel.register(createTargetsCommandModule(moduleOptions));
  return kernel;
};

export interface RunRigbuildCliOptions extends CreateRigbuildCliKernelOptions {
  readonly argv?: readonly string[] | undefined;
}

export const NO_COMMAND_HINT = 'Run `rigbuild targets --help` to list and plan build targets.\n';

/**
 * Runs the CLI once. Without a command the root help goes to stderr and a pointer to the
 * targets workflows follows on stdout.
 */
export const runRigbuildCli = async ({
  argv = process.argv,
  io = createProcessCliIo(),
  ...options
}: RunRigbuildCliOptions): Promise<number> => {
  const exitCode = await createRigbuildCliKernel({ ...options, io }).run(argv);
  if (argv.length <= 2) {
    io.writeOut(NO_COMMAND_HINT);
  }
  return exitCode;
};
