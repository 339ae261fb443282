export {
  ACCELERATE_FRAMEWORK,
  DLIB_BLAS_OFF,
  DLIB_BLAS_ON,
  DLIB_FIXED_OPTIONS,
  DLIB_LINUX_COMPILER_FLAGS,
  DLIB_TARGET_NAME,
  OPENBLAS_INJECTION,
  planDlibConfiguration,
  planDlibPackaging,
  selectBlasBackend,
  type BlasBackend,
} from './dlib-configuration.js';
export { dlibTarget } from './dlib-target.js';
