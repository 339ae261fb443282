/**
 * Binds the include and library exports of another target into a target's build inputs.
 */
export interface ProductInjection {
  /** Target receiving the products. */
  readonly target: string;
  /** Target exporting the products. */
  readonly product: string;
  readonly includeVariable: string;
  readonly librariesVariable: string;
}

export interface TargetConfigurationPlan {
  readonly options: readonly string[];
  readonly compilerFlags: readonly string[];
  readonly productInjections: readonly ProductInjection[];
}

export interface TargetPackagingPlan {
  readonly systemLibraries: readonly string[];
}

export const freezeConfigurationPlan = (plan: TargetConfigurationPlan): TargetConfigurationPlan =>
  Object.freeze({
    options: Object.freeze([...plan.options]),
    compilerFlags: Object.freeze([...plan.compilerFlags]),
    productInjections: Object.freeze(
      plan.productInjections.map((injection) => Object.freeze({ ...injection })),
    ),
  });

export const freezePackagingPlan = (plan: TargetPackagingPlan): TargetPackagingPlan =>
  Object.freeze({ systemLibraries: Object.freeze([...plan.systemLibraries]) });
