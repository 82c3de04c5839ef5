/** 브랜드 타입 -- 원시 타입에 의미론적 구분 부여 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/** 오버라이드 대상(래핑된 함수) 식별자 */
export type TargetId = Brand<number, 'TargetId'>;

/** 로그 레벨 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export function createTargetId(id: number): TargetId {
  return id as TargetId;
}
