export * from './errors/index.js';
export * from './range/index.js';
export * from './remote/index.js';
export {
  LOG_LEVELS,
  isLogLevel,
  isLevelEnabled,
  formatLogMeta,
  type Logger,
  type LogLevel,
  type LogMeta,
} from './logger.js';
export { loadEnv, type EnvLoaderOptions, type EnvLoaderResult } from './env-loader.js';
export { inferContentType, HDF5_CONTENT_TYPE, DEFAULT_CONTENT_TYPE } from './content-type.js';
export { resolveServingRoot, resolveRequestPath } from './serving-root.js';
export {
  FIXTURE_MODULUS,
  createFixtureBytes,
  findFixtureMismatch,
  assertFixtureSize,
  writeFixture,
} from './fixtures.js';
