import type { LogLevel } from './common.js';

/** whatif 루트 설정 타입 */
export interface WhatIfConfig {
  logging?: LoggingConfig;
  engine?: EngineConfig;
}

export interface LoggingConfig {
  level?: LogLevel;
  file?: boolean;
  console?: boolean;
}

export interface EngineConfig {
  /** exit 순서 위반 시 경고 대신 throw */
  strictBalance?: boolean;
}

export interface ConfigValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}
