export const PLATFORMS = Object.freeze(['linux', 'macos', 'ios', 'windows', 'android'] as const);

export type Platform = (typeof PLATFORMS)[number];

/**
 * Read-only build context a host hands to every target: the platform being built for and
 * whether the build asked for an OpenBLAS backend.
 */
export interface PlatformContext {
  readonly platform: Platform;
  readonly openblas: boolean;
}

export class UnsupportedPlatformError extends Error {
  constructor(readonly platform: string) {
    super(`Unsupported platform "${platform}". Expected one of: ${PLATFORMS.join(', ')}.`);
    this.name = 'UnsupportedPlatformError';
  }
}

export const isPlatform = (value: string): value is Platform =>
  PLATFORMS.some((platform) => platform === value);

export const createPlatformContext = (
  platform: Platform,
  options: { readonly openblas?: boolean } = {},
): PlatformContext => Object.freeze({ platform, openblas: options.openblas ?? false });

export const isLinux = (context: PlatformContext): boolean => context.platform === 'linux';

export const isMacOs = (context: PlatformContext): boolean => context.platform === 'macos';

export const isIos = (context: PlatformContext): boolean => context.platform === 'ios';

/** macOS and iOS both ship the Accelerate framework. */
export const isApple = (context: PlatformContext): boolean => isMacOs(context) || isIos(context);

export const wantsOpenBlas = (context: PlatformContext): boolean => context.openblas;

const NODE_PLATFORMS: Readonly<Partial<Record<NodeJS.Platform, Platform>>> = Object.freeze({
  darwin: 'macos',
  linux: 'linux',
  win32: 'windows',
  android: 'android',
});

/**
 * Maps a Node.js platform identifier onto the platform a host build targets by default.
 *
 * @throws {UnsupportedPlatformError} When the identifier has no matching platform.
 */
export function detectHostPlatform(nodePlatform: NodeJS.Platform): Platform {
  const platform = NODE_PLATFORMS[nodePlatform];
  if (platform === undefined) {
    throw new UnsupportedPlatformError(nodePlatform);
  }
  return platform;
}

/**
 * Parses a user supplied platform name, ignoring case and surrounding whitespace.
 *
 * @throws {UnsupportedPlatformError} When the name is not a known platform.
 */
export function parsePlatform(value: string): Platform {
  const normalised = value.trim().toLowerCase();
  if (!isPlatform(normalised)) {
    throw new UnsupportedPlatformError(value);
  }
  return normalised;
}
