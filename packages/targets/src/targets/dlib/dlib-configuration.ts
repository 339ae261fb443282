import {
  isApple,
  isLinux,
  wantsOpenBlas,
  type PlatformContext,
} from '../../domain/models/platform.js';
import {
  freezeConfigurationPlan,
  freezePackagingPlan,
  type ProductInjection,
  type TargetConfigurationPlan,
  type TargetPackagingPlan,
} from '../../domain/models/plans.js';

export const DLIB_TARGET_NAME = 'dlib';

/** Optional subsystems dlib is always built without. */
export const DLIB_FIXED_OPTIONS = Object.freeze([
  'DLIB_NO_GUI_SUPPORT=TRUE',
  'DLIB_ENABLE_ASSERTS=OFF',
  'DLIB_PNG_SUPPORT=OFF',
  'DLIB_JPEG_SUPPORT=OFF',
  'DLIB_GIF_SUPPORT=OFF',
  'DLIB_LINK_WITH_SQLITE3=OFF',
  'DLIB_USE_CUDA=OFF',
  'DLIB_USE_LAPACK=OFF',
] as const);

export const DLIB_BLAS_ON = 'DLIB_USE_BLAS=ON';
export const DLIB_BLAS_OFF = 'DLIB_USE_BLAS=OFF';

// Clang flags dlib's constant comparisons as tautological on Linux.
export const DLIB_LINUX_COMPILER_FLAGS = Object.freeze([
  '-Wno-tautological-constant-compare',
] as const);

export const OPENBLAS_INJECTION: ProductInjection = Object.freeze({
  target: DLIB_TARGET_NAME,
  product: 'OpenBLAS',
  includeVariable: 'OPENBLAS_INCLUDE',
  librariesVariable: 'OPENBLAS_LIBS',
});

export const ACCELERATE_FRAMEWORK = '-framework Accelerate';

export type BlasBackend = 'accelerate' | 'openblas' | 'none';

export function selectBlasBackend(context: PlatformContext): BlasBackend {
  if (isApple(context)) {
    return 'accelerate';
  }
  if (wantsOpenBlas(context)) {
    return 'openblas';
  }
  return 'none';
}

/**
 * Computes the CMake options, compiler flags and product injections dlib needs on the given
 * platform. Exactly one `DLIB_USE_BLAS` option is produced.
 */
export function planDlibConfiguration(context: PlatformContext): TargetConfigurationPlan {
  const options: string[] = [...DLIB_FIXED_OPTIONS];
  const compilerFlags: string[] = isLinux(context) ? [...DLIB_LINUX_COMPILER_FLAGS] : [];
  const productInjections: ProductInjection[] = [];

  const backend = selectBlasBackend(context);
  switch (backend) {
    case 'accelerate': {
      options.push(DLIB_BLAS_ON);
      break;
    }
    case 'openblas': {
      options.push(DLIB_BLAS_ON);
      productInjections.push(OPENBLAS_INJECTION);
      break;
    }
    case 'none': {
      options.push(DLIB_BLAS_OFF);
      break;
    }
    default: {
      const unreachable: never = backend;
      throw new Error(`Unsupported BLAS backend ${String(unreachable)}`);
    }
  }

  return freezeConfigurationPlan({ options, compilerFlags, productInjections });
}

export function planDlibPackaging(context: PlatformContext): TargetPackagingPlan {
  return freezePackagingPlan({
    systemLibraries: isApple(context) ? [ACCELERATE_FRAMEWORK] : [],
  });
}
