export type PackageName = `@rigbuild/${string}`;

export interface PackageManifest {
  readonly name: PackageName;
  readonly summary: string;
}

export type FrozenManifest<T extends PackageManifest = PackageManifest> = Readonly<T>;

export const createManifest = <T extends PackageManifest>(manifest: T): FrozenManifest<T> =>
  Object.freeze({ ...manifest });

export {
  JsonLineLogger,
  noopLogger,
  type JsonLineLoggerOptions,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export * from './runtime/index.js';

export {
  ConfigFileNotFoundError,
  DEFAULT_RIGBUILD_CONFIG_FILES,
  findConfigFile,
  loadConfigFile,
  type FindConfigFileOptions,
  type LoadConfigFileOptions,
  type LoadedConfigFile,
} from './config/index.js';

const manifestDefinition = {
  name: '@rigbuild/core',
  summary: 'Logging, lifecycle events and configuration loading shared by rigbuild packages.',
} as const satisfies PackageManifest;

export const manifest = createManifest(manifestDefinition);
