import { inspect } from 'node:util';

export interface FormatCliErrorOptions {
  /** Print the stack trace instead of just the message. */
  readonly verbose?: boolean;
}

export const formatCliError = (error: unknown, options: FormatCliErrorOptions = {}): string => {
  if (error instanceof Error) {
    if (options.verbose) {
      return error.stack ?? error.message;
    }
    return `${error.name}: ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 4, maxArrayLength: 10 });
};
