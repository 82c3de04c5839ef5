// packages/core/src/imaginable.ts
import { WhatIfError, type WhatIfLogger } from '@whatif/infra';
import { createTargetId } from '@whatif/types';
import type { Target } from './types.js';
import { Activation, PointBuilder } from './activation.js';
import { Cursor, type ReadonlyCursor } from './cursor.js';
import { getEngineDefaults } from './runtime.js';
import { findScene, Scene } from './scene.js';

export interface ImaginableOptions {
  /** 로그/에러에 쓰는 이름 (기본: fn.name, 없으면 'anonymous') */
  name?: string;
  logger?: WhatIfLogger;
  /** exit 순서 위반 시 throw (기본: 설정의 engine.strictBalance) */
  strictBalance?: boolean;
}

export interface ImaginableApi<A extends unknown[], R> {
  readonly original: (...args: A) => R;
  readonly label: string;
  readonly cursor: ReadonlyCursor<A, R>;
  /** 입력 포인트 고정 — 지금 활성화된 체인이 base가 된다 */
  at(...args: A): PointBuilder<A, R>;
  /** 모든 입력에 대해 value를 반환하도록 하는 오버라이드 */
  imagine(value: R): Activation<A, R>;
  /**
   * n번 전 활성화 시점의 체인으로 평가하는 함수.
   * 호출 시점의 history로 고정되므로 범위를 떠나지 않고 안팎 값을 비교할 수 있다.
   */
  lookBack(n: number): (...args: A) => R;
}

/** 원래 함수와 같은 시그니처로 호출할 수 있는 래핑 함수 */
export type Imaginable<A extends unknown[], R> = ((...args: A) => R) & ImaginableApi<A, R>;

let nextTargetId = 1;

/**
 * 함수를 래핑해 범위 한정 오버라이드를 걸 수 있게 한다.
 *
 * ```ts
 * const price = imaginable((sku: string) => lookupPrice(sku));
 * price.at('A-1').imagine(0).run(() => checkoutTotal(cart));
 * ```
 *
 * 호출 시 활성 체인을 head부터 훑어 처음 적용되는 값을 반환하고, 없으면 원래 함수를
 * 같은 this/인자로 호출한다. 원래 함수의 에러는 그대로 전파된다.
 * 활성 상태는 대상마다 하나이며 동기화하지 않는다 — 한 논리 스레드에서만 enter/exit할 것.
 */
export function imaginable<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: ImaginableOptions = {},
): Imaginable<A, R> {
  const label = options.name ?? (fn.name || 'anonymous');
  const target: Target<A, R> = {
    id: createTargetId(nextTargetId++),
    label,
    cursor: new Cursor<A, R>(),
    logger: options.logger ?? getEngineDefaults().logger.child(label),
    strictBalance: options.strictBalance ?? getEngineDefaults().strictBalance,
  };

  function evaluate(head: Scene<A, R> | undefined, thisArg: unknown, args: A): R {
    const scene = findScene(head, args);
    return scene ? scene.value : fn.apply(thisArg, args);
  }

  function call(this: unknown, ...args: A): R {
    return evaluate(target.cursor.active, this, args);
  }

  const api: ImaginableApi<A, R> = {
    original: fn,
    label,
    cursor: target.cursor,
    at: (...args: A) => new PointBuilder(target, target.cursor.active, args),
    imagine: (value: R) => new Activation(target, new Scene(target.cursor.active, undefined, value)),
    lookBack: (n: number) => {
      if (!Number.isInteger(n) || n < 0) {
        throw new WhatIfError(`lookBack expects a non-negative integer, got ${n}`, 'INVALID_LOOKBACK', {
          details: { target: label, n },
        });
      }
      const head = target.cursor.lookBack(n);
      return function (this: unknown, ...args: A): R {
        return evaluate(head, this, args);
      };
    },
  };

  return Object.assign(call, api);
}
