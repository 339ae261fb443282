export type {
  TargetEvent,
  TargetEventType,
  TargetStage,
  TargetStageErrorEvent,
  TargetStageEvent,
} from './target-events.js';
export {
  InMemoryTargetEventBus,
  type TargetEventBusPort,
  type TargetEventListener,
  type Unsubscribe,
} from './target-event-bus.js';
export { createTargetEventLogger, type TargetEventLoggerOptions } from './target-event-logging.js';
