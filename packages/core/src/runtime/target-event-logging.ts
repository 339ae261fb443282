import type { LogLevel, StructuredLogEvent, StructuredLogger } from '../logging/index.js';

import type { TargetEvent, TargetEventType } from './target-events.js';
import type { TargetEventListener } from './target-event-bus.js';

export interface TargetEventLoggerOptions {
  readonly logger: StructuredLogger;
  /** Logger name written to every entry. */
  readonly scope: string;
  /** Prefix for the entry `event` field, e.g. `target.stage` gives `target.stage.start`. */
  readonly eventPrefix: string;
}

type EntryBody = Pick<StructuredLogEvent, 'elapsedMs' | 'data'>;

const LEVELS: Readonly<Record<TargetEventType, LogLevel>> = {
  'stage:start': 'info',
  'stage:complete': 'info',
  'stage:error': 'error',
};

/**
 * Turns target lifecycle events into structured log entries.
 */
export function createTargetEventLogger(options: TargetEventLoggerOptions): TargetEventListener {
  const { logger, scope, eventPrefix } = options;

  return (event) => {
    logger.log({
      level: LEVELS[event.type],
      name: scope,
      event: `${eventPrefix}.${event.type.slice('stage:'.length)}`,
      ...buildEntryBody(event),
    });
  };
}

function buildEntryBody(event: TargetEvent): EntryBody {
  const { payload } = event;
  const subject = { target: payload.target, stage: payload.stage };

  switch (event.type) {
    case 'stage:start': {
      return { data: subject };
    }
    case 'stage:complete': {
      const elapsedMs = readDuration(payload.attributes);
      return {
        ...(elapsedMs === undefined ? {} : { elapsedMs }),
        data: {
          ...subject,
          ...(payload.attributes === undefined ? {} : { attributes: { ...payload.attributes } }),
        },
      };
    }
    case 'stage:error': {
      return { data: { ...subject, message: describeError(event.payload.error) } };
    }
  }
}

function readDuration(
  attributes: Readonly<Record<string, unknown>> | undefined,
): number | undefined {
  const value = attributes?.['durationMs'];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error === null || error === undefined) {
    return 'unknown error';
  }
  try {
    return JSON.stringify(error) ?? 'unknown error';
  } catch {
    return String(error);
  }
}
