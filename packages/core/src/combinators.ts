// packages/core/src/combinators.ts
import type { Scope } from './types.js';
import { CompositeActivation } from './composite.js';

/** 여러 활성화를 선언 순서대로 하나로 묶는다 */
export function combineAll(first: Scope, ...rest: Scope[]): CompositeActivation {
  return new CompositeActivation([first, ...rest]);
}

/** scope.run(fn)의 함수형 별칭 */
export function imagining<T>(scope: Scope, fn: () => T): T {
  return scope.run(fn);
}
