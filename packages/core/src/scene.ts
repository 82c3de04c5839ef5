// packages/core/src/scene.ts

/** 호출 인자에 대한 술어. 없으면 모든 호출에 적용된다. */
export type Guard<A extends unknown[]> = (args: A) => boolean;

/**
 * 오버라이드 하나 (guard + value)
 *
 * 단방향 연결 리스트의 불변 노드. 여러 체인이 같은 접미부를 공유하므로
 * 생성 후에는 parent를 포함해 어떤 필드도 바뀌지 않는다.
 */
export class Scene<A extends unknown[], R> {
  constructor(
    readonly parent: Scene<A, R> | undefined,
    readonly guard: Guard<A> | undefined,
    readonly value: R,
  ) {
    Object.freeze(this);
  }

  applies(args: A): boolean {
    return this.guard === undefined || this.guard(args);
  }

  /** guard/value는 그대로, parent만 바꾼 사본 */
  withParent(parent: Scene<A, R> | undefined): Scene<A, R> {
    return new Scene(parent, this.guard, this.value);
  }
}

/** head → root 순회 */
export function* chainOf<A extends unknown[], R>(
  head: Scene<A, R> | undefined,
): Generator<Scene<A, R>> {
  for (let p = head; p !== undefined; p = p.parent) {
    yield p;
  }
}

/** 체인에서 args에 처음 적용되는 Scene (없으면 undefined) */
export function findScene<A extends unknown[], R>(
  head: Scene<A, R> | undefined,
  args: A,
): Scene<A, R> | undefined {
  for (const scene of chainOf(head)) {
    if (scene.applies(args)) {
      return scene;
    }
  }
  return undefined;
}

/**
 * 체인을 새 base 위로 다시 잇는다.
 *
 * root 쪽부터 접어 올려 같은 길이·같은 guard/value의 새 체인을 만든다.
 * 원래 체인과 base는 건드리지 않는다.
 */
export function reparent<A extends unknown[], R>(
  head: Scene<A, R>,
  base: Scene<A, R> | undefined,
): Scene<A, R> {
  const ancestors = [...chainOf(head.parent)].reverse();
  let top = base;
  for (const scene of ancestors) {
    top = scene.withParent(top);
  }
  return head.withParent(top);
}

export function chainLength<A extends unknown[], R>(head: Scene<A, R> | undefined): number {
  let n = 0;
  for (let p = head; p !== undefined; p = p.parent) {
    n++;
  }
  return n;
}
