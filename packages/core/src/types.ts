// packages/core/src/types.ts
import type { WhatIfLogger } from '@whatif/infra';
import type { TargetId } from '@whatif/types';
import type { CompositeActivation } from './composite.js';
import type { Cursor } from './cursor.js';

/**
 * 범위 한정 활성화 — 단일 대상(Activation) 또는 묶음(CompositeActivation)
 *
 * enter()/exit()는 반드시 LIFO 짝으로 호출해야 한다. run()은 어떤 경로로
 * 빠져나가든 exit()를 보장한다.
 */
export interface Scope {
  readonly label: string;
  enter(): this;
  exit(): void;
  run<T>(fn: () => T): T;
  combine(other: Scope): CompositeActivation;
  rebase(): Scope;
}

/** 래핑된 함수 하나와 그 함수에서 만들어진 모든 Activation이 공유하는 상태 */
export interface Target<A extends unknown[], R> {
  readonly id: TargetId;
  readonly label: string;
  readonly cursor: Cursor<A, R>;
  readonly logger: WhatIfLogger;
  readonly strictBalance: boolean;
}
