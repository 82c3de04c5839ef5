// packages/infra/src/errors.ts

/**
 * whatif 기본 에러
 *
 * code로 분기하고 details에 진단용 값을 싣는다. 도메인 에러는 각 패키지에 둔다
 * (ConfigError → config, IncomparablePointError/UnbalancedActivationError → core).
 */
export class WhatIfError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    opts: {
      cause?: Error;
      details?: Record<string, unknown>;
    } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = 'WhatIfError';
    this.code = code;
    this.details = opts.details;
  }
}
