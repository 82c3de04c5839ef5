// @whatif/config — barrel export

// 타입
export type { ConfigDeps } from './types.js';
export type { ValidationResult } from './validation.js';
export type { ConfigIO } from './io.js';
export type { ResolvedWhatIfConfig } from './defaults.js';

// 에러
export { ConfigError } from './errors.js';

// 스키마
export { WhatIfConfigSchema } from './zod-schema.js';
export type { ValidatedWhatIfConfig } from './zod-schema.js';

// 검증
export { validateConfig } from './validation.js';

// 파이프라인 개별 단계
export { resolveConfigPath } from './paths.js';
export { resolveEnvOverrides } from './env-overrides.js';
export { mergeConfig } from './merge-config.js';
export { applyDefaults } from './defaults.js';

// IO (파이프라인 통합)
export { createConfigIO, loadConfig, clearConfigCache } from './io.js';
