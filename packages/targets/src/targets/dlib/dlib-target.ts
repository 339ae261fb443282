import type { PlatformContext } from '../../domain/models/platform.js';
import type { TargetDescriptor } from '../../domain/ports/target-descriptor.js';
import type { TargetHostPort } from '../../domain/ports/target-host.js';
import {
  DLIB_TARGET_NAME,
  planDlibConfiguration,
  planDlibPackaging,
} from './dlib-configuration.js';

export const dlibTarget: TargetDescriptor = Object.freeze({
  name: DLIB_TARGET_NAME,

  dependencies(host: TargetHostPort): void {
    host.declareDependencies([]);
  },

  configure(context: PlatformContext, host: TargetHostPort): void {
    const plan = planDlibConfiguration(context);
    host.addCMakeOptions(...plan.options);
    if (plan.compilerFlags.length > 0) {
      host.addCompilerFlags(...plan.compilerFlags);
    }
    for (const injection of plan.productInjections) {
      host.injectProducts(injection);
    }
  },

  package(context: PlatformContext, host: TargetHostPort): void {
    host.defaultPackage();
    for (const library of planDlibPackaging(context).systemLibraries) {
      host.exportSystemLibrary(library);
    }
  },
});
