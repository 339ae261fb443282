import type { ProductInjection } from '../models/plans.js';

/**
 * Capabilities a build orchestrator exposes to one target while driving its lifecycle. A host
 * instance belongs to a single target for a single build invocation.
 */
export interface TargetHostPort {
  declareDependencies(dependencies: readonly string[]): void;
  addCMakeOptions(...options: readonly string[]): void;
  addCompilerFlags(...flags: readonly string[]): void;
  injectProducts(injection: ProductInjection): void;
  /** Collects the compiled artifacts the way the orchestrator does for every target. */
  defaultPackage(): void;
  exportSystemLibrary(library: string): void;
}
