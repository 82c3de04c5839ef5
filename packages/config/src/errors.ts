// packages/config/src/errors.ts
import { WhatIfError } from '@whatif/infra';

/** 설정 시스템 기본 에러 */
export class ConfigError extends WhatIfError {
  constructor(message: string, opts?: { cause?: Error; details?: Record<string, unknown> }) {
    super(message, 'CONFIG_ERROR', opts);
    this.name = 'ConfigError';
  }
}
