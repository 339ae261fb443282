import type { ProductInjection } from '../domain/models/plans.js';
import type { TargetHostPort } from '../domain/ports/target-host.js';

export interface TargetBuildRecord {
  readonly target: string;
  readonly dependencies: readonly string[];
  readonly options: readonly string[];
  readonly compilerFlags: readonly string[];
  readonly productInjections: readonly ProductInjection[];
  readonly systemLibraries: readonly string[];
  readonly packaged: boolean;
}

export interface RecordingTargetHostOptions {
  /** Stands in for the orchestrator's default artifact collection. */
  readonly packager?: (target: string) => void;
}

/**
 * In-memory host that records everything a target asks of it. Used to compute build plans
 * without invoking the native build system.
 */
export class RecordingTargetHost implements TargetHostPort {
  private readonly dependencies: string[] = [];
  private readonly options: string[] = [];
  private readonly compilerFlags: string[] = [];
  private readonly productInjections: ProductInjection[] = [];
  private readonly systemLibraries: string[] = [];
  private packaged = false;

  constructor(
    readonly target: string,
    private readonly hostOptions: RecordingTargetHostOptions = {},
  ) {}

  declareDependencies(dependencies: readonly string[]): void {
    for (const dependency of dependencies) {
      if (!this.dependencies.includes(dependency)) {
        this.dependencies.push(dependency);
      }
    }
  }

  addCMakeOptions(...options: readonly string[]): void {
    this.options.push(...options);
  }

  addCompilerFlags(...flags: readonly string[]): void {
    this.compilerFlags.push(...flags);
  }

  injectProducts(injection: ProductInjection): void {
    this.productInjections.push({ ...injection });
  }

  defaultPackage(): void {
    this.hostOptions.packager?.(this.target);
    this.packaged = true;
  }

  exportSystemLibrary(library: string): void {
    if (!this.systemLibraries.includes(library)) {
      this.systemLibraries.push(library);
    }
  }

  snapshot(): TargetBuildRecord {
    return Object.freeze({
      target: this.target,
      dependencies: Object.freeze([...this.dependencies]),
      options: Object.freeze([...this.options]),
      compilerFlags: Object.freeze([...this.compilerFlags]),
      productInjections: Object.freeze(
        this.productInjections.map((injection) => Object.freeze({ ...injection })),
      ),
      systemLibraries: Object.freeze([...this.systemLibraries]),
      packaged: this.packaged,
    });
  }
}
