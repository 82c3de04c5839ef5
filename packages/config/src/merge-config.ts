// packages/config/src/merge-config.ts
import { isPlainObject } from '@whatif/infra';

/**
 * 재귀 병합
 *
 * - 객체: 재귀 병합
 * - 원시값/배열: source 우선 (undefined는 건너뜀)
 * - 프로토타입 오염 방지
 */
export function mergeConfig(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    if (key === '__proto__' || key === 'constructor' || key === 'prototype') {
      continue;
    }

    const tVal = result[key];
    const sVal = source[key];

    if (sVal === undefined) {
      continue;
    }
    if (isPlainObject(tVal) && isPlainObject(sVal)) {
      result[key] = mergeConfig(tVal, sVal);
    } else {
      result[key] = sVal;
    }
  }

  return result;
}

