import type { TargetId } from '@whatif/types';
import { createTargetId } from '@whatif/types';
import { describe, it, expect, expectTypeOf } from 'vitest';

describe('Brand 타입 안전성', () => {
  it('팩토리 함수가 올바른 Brand 타입을 반환한다', () => {
    expectTypeOf(createTargetId(1)).toMatchTypeOf<TargetId>();
  });

  it('팩토리 함수는 값을 그대로 유지한다', () => {
    expect(createTargetId(7)).toBe(7);
  });

  it('plain number는 TargetId에 할당 불가하다', () => {
    expectTypeOf<number>().not.toMatchTypeOf<TargetId>();
  });
});
