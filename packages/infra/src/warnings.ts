// packages/infra/src/warnings.ts

const emitted = new Set<string>();

/**
 * 중복 경고 억제 래퍼
 *
 * 동일 key로 호출 시 최초 1회만 fn 실행. 실행 여부를 반환한다.
 */
export function warnOnce(key: string, fn: () => void): boolean {
  if (emitted.has(key)) {
    return false;
  }
  emitted.add(key);
  fn();
  return true;
}

/** 테스트용 상태 초기화 */
export function resetWarnings(): void {
  emitted.clear();
}
