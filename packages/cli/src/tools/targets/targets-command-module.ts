import type { Command } from 'commander';
import { createDefaultTargetRegistry, type TargetRegistry } from '@rigbuild/targets';

import type { CliCommandModule } from '../../kernel/types.js';
import { registerPlanOptions } from './options.js';
import { executeTargetsPlanCommand } from './plan-command-runner.js';

export interface TargetsCommandModuleOptions {
  readonly registry?: TargetRegistry;
  readonly cwd?: string;
  readonly hostPlatform?: NodeJS.Platform;
}

export const createTargetsCommandModule = (
  moduleOptions: TargetsCommandModuleOptions = {},
): CliCommandModule => ({
  id: 'targets.workflows',
  register(program, context) {
    const registry = moduleOptions.registry ?? createDefaultTargetRegistry();

    const targetsCommand = program
      .command('targets')
      .summary('Inspect registered build targets.')
      .description('List build targets and plan their native build configuration.');

    targetsCommand.helpOption('-h, --help', 'Display targets command help.');
    targetsCommand.action(() => {
      targetsCommand.help();
    });

    targetsCommand
      .command('list')
      .summary('List registered targets.')
      .action(() => {
        for (const name of registry.list()) {
          context.io.writeOut(`${name}\n`);
        }
      });

    const planCommand = targetsCommand
      .command('plan')
      .summary('Print the native build plan for a target.')
      .description(
        'Run a target through its lifecycle without building it and print the resulting plan.',
      )
      .argument('<target>', 'Name of the target to plan');

    registerPlanOptions(planCommand);
    planCommand.action(async (target: string, _options: unknown, command: Command) => {
      await executeTargetsPlanCommand({
        target,
        command,
        io: context.io,
        globalOptions: context.getGlobalOptions(),
        registry,
        ...(moduleOptions.cwd === undefined ? {} : { cwd: moduleOptions.cwd }),
        ...(moduleOptions.hostPlatform === undefined
          ? {}
          : { hostPlatform: moduleOptions.hostPlatform }),
      });
    });
  },
});

export const targetsCommandModule = createTargetsCommandModule();
