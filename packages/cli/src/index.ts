export { createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo } from './io/process-cli-io.js';
export type { CliIo } from './io/cli-io.js';
export { createMemoryCliIo, type MemoryCliIo } from './testing/memory-cli-io.js';
export {
  createTargetsCommandModule,
  targetsCommandModule,
  type TargetsCommandModuleOptions,
} from './tools/targets/targets-command-module.js';
export { executeTargetsPlanCommand } from './tools/targets/plan-command-runner.js';
export { formatBuildPlan } from './tools/targets/plan-reporter.js';
export { NO_COMMAND_HINT, createRigbuildCliKernel, runRigbuildCli } from './run-cli.js';
export {
  CLI_PACKAGE_NAME,
  findCliManifest,
  type CliPackageManifest,
} from './package-manifest.js';
