export interface CMakeOption {
  readonly key: string;
  readonly value: string;
}

export interface CMakeOptionConflict {
  readonly key: string;
  readonly values: readonly string[];
}

export class InvalidCMakeOptionError extends Error {
  constructor(readonly option: string) {
    super(`Invalid CMake option "${option}". Expected KEY=VALUE.`);
    this.name = 'InvalidCMakeOptionError';
  }
}

const OPTION_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(?::[A-Z]+)?$/;

/**
 * Splits a `KEY=VALUE` option on its first `=`. A `KEY:TYPE=VALUE` cache entry keeps its type
 * suffix in the key.
 *
 * @throws {InvalidCMakeOptionError} When the option has no `=` or its key is not an identifier.
 */
export function parseCMakeOption(option: string): CMakeOption {
  const separator = option.indexOf('=');
  if (separator <= 0) {
    throw new InvalidCMakeOptionError(option);
  }

  const key = option.slice(0, separator).trim();
  if (!OPTION_KEY_PATTERN.test(key)) {
    throw new InvalidCMakeOptionError(option);
  }

  return { key, value: option.slice(separator + 1) };
}

export function renderCMakeArguments(options: readonly string[]): string[] {
  return options.map((option) => {
    const { key, value } = parseCMakeOption(option);
    return `-D${key}=${value}`;
  });
}

/**
 * Reports every key that is assigned more than one distinct value. Repeating an identical
 * assignment is not a conflict.
 */
export function findConflictingOptions(options: readonly string[]): CMakeOptionConflict[] {
  const valuesByKey = new Map<string, string[]>();

  for (const option of options) {
    const { key, value } = parseCMakeOption(option);
    const name = stripTypeSuffix(key);
    const values = valuesByKey.get(name);
    if (!values) {
      valuesByKey.set(name, [value]);
      continue;
    }
    if (!values.includes(value)) {
      values.push(value);
    }
  }

  return [...valuesByKey.entries()]
    .filter(([, values]) => values.length > 1)
    .map(([key, values]) => ({ key, values }));
}

function stripTypeSuffix(key: string): string {
  const colon = key.indexOf(':');
  return colon === -1 ? key : key.slice(0, colon);
}
