// packages/core/src/errors.ts
import { WhatIfError } from '@whatif/infra';

/** 동등 비교가 불가능한 인자로 포인트를 정의하려 할 때 */
export class IncomparablePointError extends WhatIfError {
  readonly target: string;
  readonly argPath: string;

  constructor(target: string, argPath: string, reason: string) {
    super(`Cannot imagine ${target} at a point with ${reason} (${argPath})`, 'INCOMPARABLE_POINT', {
      details: { target, argPath, reason },
    });
    this.name = 'IncomparablePointError';
    this.target = target;
    this.argPath = argPath;
  }
}

/** enter/exit 짝이 맞지 않을 때 (호출자 계약 위반) */
export class UnbalancedActivationError extends WhatIfError {
  readonly target: string;

  constructor(target: string, message: string) {
    super(`Unbalanced activation on ${target}: ${message}`, 'UNBALANCED_ACTIVATION', {
      details: { target },
    });
    this.name = 'UnbalancedActivationError';
    this.target = target;
  }
}
