import type { TargetBuildPlan } from '@rigbuild/targets';

import type { PlanOutputFormat } from './options.js';

export const formatBuildPlan = (plan: TargetBuildPlan, format: PlanOutputFormat): string =>
  format === 'json' ? `${JSON.stringify(toJsonPlan(plan), null, 2)}\n` : formatHumanPlan(plan);

const toJsonPlan = (plan: TargetBuildPlan) => ({
  target: plan.target,
  platform: plan.context.platform,
  openblas: plan.context.openblas,
  dependencies: plan.dependencies,
  options: plan.options,
  cmakeArguments: plan.cmakeArguments,
  compilerFlags: plan.compilerFlags,
  productInjections: plan.productInjections,
  systemLibraries: plan.systemLibraries,
});

const formatHumanPlan = (plan: TargetBuildPlan): string => {
  const lines = [
    `Target ${plan.target} (platform: ${plan.context.platform}, openblas: ${
      plan.context.openblas ? 'on' : 'off'
    })`,
    ...section('Dependencies', plan.dependencies),
    ...section('CMake arguments', plan.cmakeArguments),
    ...section('Compiler flags', plan.compilerFlags),
    ...section(
      'Product injections',
      plan.productInjections.map((injection) => {
        const variables = `${injection.includeVariable}, ${injection.librariesVariable}`;
        return `${injection.product} -> ${injection.target} (${variables})`;
      }),
    ),
    ...section('System libraries', plan.systemLibraries),
  ];
  return `${lines.join('\n')}\n`;
};

const section = (title: string, entries: readonly string[]): string[] =>
  entries.length === 0
    ? [`${title}: none`]
    : [`${title}:`, ...entries.map((entry) => `  ${entry}`)];
