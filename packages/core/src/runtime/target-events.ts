export type TargetStage = 'dependencies' | 'configure' | 'package';

export interface TargetStageEvent {
  readonly target: string;
  readonly stage: TargetStage;
  readonly timestamp: Date;
  readonly attributes?: Readonly<Record<string, unknown>>;
}

export interface TargetStageErrorEvent extends TargetStageEvent {
  readonly error: unknown;
}

/**
 * Events published while a target moves through its lifecycle. Every stage emits `stage:start`
 * followed by either `stage:complete` or `stage:error`.
 */
export type TargetEvent =
  | { readonly type: 'stage:start'; readonly payload: TargetStageEvent }
  | { readonly type: 'stage:complete'; readonly payload: TargetStageEvent }
  | { readonly type: 'stage:error'; readonly payload: TargetStageErrorEvent };

export type TargetEventType = TargetEvent['type'];
