// packages/core/src/composite.ts
import type { Scope } from './types.js';

/**
 * 여러 활성화를 한 단위로 묶는다.
 *
 * 잎(leaf) 활성화를 깊이 우선·왼쪽→오른쪽으로 enter하고 정확히 역순으로 exit한다.
 * 같은 대상을 겨냥한 잎이 섞여 있어도 검사하지 않는다 (나중에 enter된 쪽이 우선).
 */
export class CompositeActivation implements Scope {
  private readonly components: readonly Scope[];

  constructor(components: readonly Scope[]) {
    this.components = [...components];
  }

  get label(): string {
    return this.leaves()
      .map((leaf) => leaf.label)
      .join(' + ');
  }

  /** 평탄화된 잎 목록 (enter 순서) */
  leaves(): Scope[] {
    const out: Scope[] = [];
    const work = [...this.components].reverse();
    while (work.length > 0) {
      const component = work.pop();
      if (component instanceof CompositeActivation) {
        work.push(...[...component.components].reverse());
      } else if (component !== undefined) {
        out.push(component);
      }
    }
    return out;
  }

  enter(): this {
    const entered: Scope[] = [];
    try {
      for (const leaf of this.leaves()) {
        leaf.enter();
        entered.push(leaf);
      }
    } catch (err) {
      const failures = exitEach(entered.reverse());
      if (failures.length > 0) {
        throw new AggregateError([err, ...failures], `Failed to enter ${this.label}`);
      }
      throw err;
    }
    return this;
  }

  /**
   * 잎을 역순으로 모두 exit한다.
   *
   * 한 잎의 exit가 throw해도 (strictBalance 위반 등) 나머지 잎은 계속 exit한 뒤
   * 에러를 던진다. 실패가 여럿이면 AggregateError.
   */
  exit(): void {
    const failures = exitEach(this.leaves().reverse());
    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `Failed to exit ${this.label}`);
    }
  }

  /** 잎들의 run()을 중첩 호출 — 바깥 잎이 먼저 들어가고 나중에 나온다 */
  run<T>(fn: () => T): T {
    const nested = this.leaves().reduceRight<() => T>(
      (inner, leaf) => () => leaf.run(inner),
      fn,
    );
    return nested();
  }

  combine(other: Scope): CompositeActivation {
    return new CompositeActivation([this, other]);
  }

  /** 모든 잎을 호출 시점의 활성 체인 위로 다시 잇는다 */
  rebase(): CompositeActivation {
    return new CompositeActivation(this.leaves().map((leaf) => leaf.rebase()));
  }
}

/** 주어진 순서로 exit하고 실패한 잎의 에러를 모은다 */
function exitEach(leaves: readonly Scope[]): unknown[] {
  const failures: unknown[] = [];
  for (const leaf of leaves) {
    try {
      leaf.exit();
    } catch (err) {
      failures.push(err);
    }
  }
  return failures;
}
