import path from 'node:path';
import process from 'node:process';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

export const DEFAULT_RIGBUILD_CONFIG_FILES = Object.freeze([
  'rigbuild.config.mjs',
  'rigbuild.config.js',
  'rigbuild.config.cjs',
  'rigbuild.config.json',
] as const);

export interface FindConfigFileOptions {
  readonly cwd?: string;
  readonly candidates?: readonly string[];
}

export interface LoadConfigFileOptions {
  readonly path: string;
  readonly cwd?: string;
}

/**
 * A configuration file as found on disk. `config` is the exported value after function and
 * promise exports have been resolved; callers validate its shape.
 */
export interface LoadedConfigFile {
  readonly path: string;
  readonly directory: string;
  readonly config: unknown;
}

export class ConfigFileNotFoundError extends Error {
  constructor(readonly filePath: string) {
    super(`Configuration file not found at ${filePath}`);
    this.name = 'ConfigFileNotFoundError';
  }
}

// Named exports tried in order before falling back to the module namespace.
const EXPORT_KEYS = ['default', 'config', 'rigbuildConfig'] as const;

const importConfigModule: Loader = async (filepath) => {
  const namespace: unknown = await import(pathToFileURL(filepath).href);
  if (!isRecord(namespace)) {
    return namespace;
  }
  const key = EXPORT_KEYS.find((candidate) => candidate in namespace);
  return key === undefined ? namespace : namespace[key];
};

async function unwrapExport(exported: unknown): Promise<unknown> {
  let value = exported;
  while (typeof value === 'function' || value instanceof Promise) {
    value = typeof value === 'function' ? await Reflect.apply(value, undefined, []) : await value;
  }
  return value;
}

// `none` keeps the search in the starting directory, away from parents and the user config dir.
const createExplorer = (searchPlaces: readonly string[]) =>
  cosmiconfig('rigbuild', {
    cache: false,
    searchStrategy: 'none',
    searchPlaces: [...searchPlaces],
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': importConfigModule,
      '.mjs': importConfigModule,
      '.cjs': importConfigModule,
    },
    transform: async (result: CosmiconfigResult): Promise<CosmiconfigResult> =>
      result === null ? null : { ...result, config: await unwrapExport(result.config) },
  });

/**
 * Looks for one of the candidate file names in `cwd` only. Parent directories and the user
 * configuration directory are not searched.
 *
 * @returns The absolute path of the first candidate that exists, or `undefined`.
 */
export async function findConfigFile(
  options: FindConfigFileOptions = {},
): Promise<string | undefined> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const candidates = options.candidates ?? DEFAULT_RIGBUILD_CONFIG_FILES;
  const result = await createExplorer(candidates).search(cwd);
  return result === null || result.isEmpty === true ? undefined : result.filepath;
}

/**
 * Loads a configuration file, resolving relative paths against `cwd`.
 *
 * @throws {ConfigFileNotFoundError} When the file does not exist or is empty.
 */
export async function loadConfigFile(options: LoadConfigFileOptions): Promise<LoadedConfigFile> {
  const filePath = path.resolve(options.cwd ?? process.cwd(), options.path);
  const explorer = createExplorer(DEFAULT_RIGBUILD_CONFIG_FILES);

  let result: CosmiconfigResult;
  try {
    result = await explorer.load(filePath);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigFileNotFoundError(filePath);
    }
    throw error;
  }

  if (result === null || result.isEmpty === true) {
    throw new ConfigFileNotFoundError(filePath);
  }
  return {
    path: result.filepath,
    directory: path.dirname(result.filepath),
    config: result.config,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error['code'] === 'ENOENT';
}
