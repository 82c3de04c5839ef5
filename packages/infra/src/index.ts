// @whatif/infra — barrel export

// 에러
export { WhatIfError } from './errors.js';

// 유틸
export { warnOnce, resetWarnings } from './warnings.js';
export { isPlainObject } from './objects.js';

// 환경/경로
export { getEnv, isTruthyEnvValue } from './env.js';
export { getStateDir, getLogDir, getConfigFilePath } from './paths.js';

// 로깅
export {
  createLogger,
  defaultLoggerFactory,
  type LoggerConfig,
  type LoggerFactory,
  type WhatIfLogger,
} from './logger.js';
export type { FileTransportConfig, LogRecord } from './logger-transports.js';
