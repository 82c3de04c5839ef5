// packages/core/src/activation.ts
import { warnOnce } from '@whatif/infra';
import type { Scope, Target } from './types.js';
import { CompositeActivation } from './composite.js';
import type { CursorMark } from './cursor.js';
import { argsEqual, copyPoint, findIncomparable } from './equality.js';
import { IncomparablePointError, UnbalancedActivationError } from './errors.js';
import { reparent, Scene, type Guard } from './scene.js';

/**
 * at(...args)로 고정한 입력 포인트. imagine(value)로 값을 묶어 Activation을 만든다.
 *
 * 인자는 at() 시점에 복사하므로 이후 호출자가 원본 객체를 바꿔도 포인트는 그대로다.
 * 같은 빌더에서 값만 바꿔 여러 번 imagine할 수 있다.
 */
export class PointBuilder<A extends unknown[], R> {
  private readonly point: readonly unknown[];
  private readonly problem: { path: string; reason: string } | undefined;

  constructor(
    private readonly target: Target<A, R>,
    private readonly base: Scene<A, R> | undefined,
    args: A,
  ) {
    // 비교할 수 없는 인자는 imagine()에서 거부되므로 복사하지 않는다
    this.problem = findIncomparable(args);
    this.point = Object.freeze(this.problem ? [...args] : args.map((arg) => copyPoint(arg)));
  }

  imagine(value: R): Activation<A, R> {
    const problem = this.problem;
    if (problem) {
      throw new IncomparablePointError(this.target.label, problem.path, problem.reason);
    }
    const point = this.point;
    const guard: Guard<A> = (args) => argsEqual(args, point);
    return new Activation(this.target, new Scene(this.base, guard, value));
  }
}

/**
 * 대상 하나에 대한 범위 한정 오버라이드
 *
 * 생성은 순수하다. enter()에서만 Cursor가 이 체인으로 바뀌고, exit()는 바로 그
 * enter() 직전의 head로 되돌린다. 같은 객체를 여러 범위에서 재사용할 수 있다.
 */
export class Activation<A extends unknown[], R> implements Scope {
  /** 열린 enter()마다 하나 (같은 Activation의 중첩 진입 허용) */
  private readonly marks: CursorMark<A, R>[] = [];

  constructor(
    private readonly target: Target<A, R>,
    readonly head: Scene<A, R>,
  ) {}

  get label(): string {
    return this.target.label;
  }

  get isActive(): boolean {
    return this.marks.length > 0;
  }

  at(...args: A): PointBuilder<A, R> {
    return new PointBuilder(this.target, this.head, args);
  }

  /** 이 체인 위에 무조건 적용되는 오버라이드를 쌓는다 */
  imagine(value: R): Activation<A, R> {
    return new Activation(this.target, new Scene(this.head, undefined, value));
  }

  enter(): this {
    const { cursor, logger, label } = this.target;
    this.marks.push(cursor.install(this.head));
    logger.debug(`enter ${label}`, { depth: cursor.depth });
    return this;
  }

  exit(): void {
    const { cursor, logger, label, strictBalance } = this.target;
    const mark = this.marks.at(-1);
    if (mark === undefined) {
      throw new UnbalancedActivationError(label, 'exit() without a matching enter()');
    }

    if (cursor.active !== this.head || cursor.depth !== mark.depth + 1) {
      const detail = `expected depth ${mark.depth + 1}, found ${cursor.depth}`;
      if (strictBalance) {
        throw new UnbalancedActivationError(label, detail);
      }
      warnOnce(`unbalanced:${this.target.id}`, () => {
        logger.warn(`Unbalanced activation on ${label}: ${detail}`);
      });
    }

    this.marks.pop();
    cursor.restore(mark);
    logger.debug(`exit ${label}`, { depth: cursor.depth });
  }

  run<T>(fn: () => T): T {
    this.enter();
    let result: T;
    try {
      result = fn();
    } finally {
      this.exit();
    }
    if (isThenable(result)) {
      const { logger, label, id } = this.target;
      warnOnce(`async:${id}`, () => {
        logger.warn(`${label}: scope was released before the returned promise settled`);
      });
    }
    return result;
  }

  combine(other: Scope): CompositeActivation {
    return new CompositeActivation([this, other]);
  }

  /**
   * 이 체인을 지금 활성화된 체인 위로 다시 이은 새 Activation
   *
   * 아무것도 활성화되지 않았으면 자기 자신을 반환한다.
   */
  rebase(): Activation<A, R> {
    const { cursor, logger, label } = this.target;
    const live = cursor.active;
    if (live === undefined) {
      return this;
    }
    logger.debug(`rebase ${label}`, { depth: cursor.depth });
    return new Activation(this.target, reparent(this.head, live));
  }
}

function isThenable(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
