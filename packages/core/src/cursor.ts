// packages/core/src/cursor.ts
import type { Scene } from './scene.js';

/** install() 시점의 복원 정보 */
export interface CursorMark<A extends unknown[], R> {
  readonly prior: Scene<A, R> | undefined;
  readonly depth: number;
}

/** 호출 측에 노출되는 읽기 전용 뷰 */
export interface ReadonlyCursor<A extends unknown[], R> {
  readonly active: Scene<A, R> | undefined;
  readonly depth: number;
  lookBack(n: number): Scene<A, R> | undefined;
}

/**
 * 래핑된 함수마다 하나씩 있는 활성 체인 포인터
 *
 * history에는 현재 열린 각 활성화 직전의 head가 쌓인다 (enter 시 push, exit 시 truncate).
 * Activation의 enter/exit만 상태를 바꾼다. 동기화는 하지 않는다.
 */
export class Cursor<A extends unknown[], R> implements ReadonlyCursor<A, R> {
  private current: Scene<A, R> | undefined = undefined;
  private readonly history: (Scene<A, R> | undefined)[] = [];

  get active(): Scene<A, R> | undefined {
    return this.current;
  }

  /** 열려 있는 활성화 수 */
  get depth(): number {
    return this.history.length;
  }

  install(head: Scene<A, R>): CursorMark<A, R> {
    const mark = { prior: this.current, depth: this.history.length };
    this.history.push(this.current);
    this.current = head;
    return mark;
  }

  /**
   * mark 시점으로 되돌린다.
   *
   * history가 이미 mark보다 얕으면 (바깥 활성화가 먼저 exit된 경우) 되살리지 않고
   * false를 반환한다.
   */
  restore(mark: CursorMark<A, R>): boolean {
    if (mark.depth > this.history.length) {
      return false;
    }
    this.history.length = mark.depth;
    this.current = mark.prior;
    return true;
  }

  /** n번 전 활성화 시점의 head. 0은 현재, 가장 오래된 것보다 앞이면 빈 체인. */
  lookBack(n: number): Scene<A, R> | undefined {
    if (n === 0) {
      return this.current;
    }
    const index = this.history.length - n;
    return index >= 0 ? this.history[index] : undefined;
  }
}
