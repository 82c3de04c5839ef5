// packages/core/src/equality.ts
import { isPlainObject } from '@whatif/infra';

/** equals(other)로 자체 동등성을 정의하는 값 */
export interface Equatable {
  equals(other: unknown): boolean;
}

/**
 * 포인트 인자 비교
 *
 * - 원시값: SameValueZero (NaN === NaN, 0 === -0)
 * - 배열/plain object: 구조 비교, 키 존재 여부까지 구분 ({} ≠ { a: undefined })
 * - Date, RegExp, Map, Set: 값 비교
 * - equals()를 가진 객체: equals 위임
 * - 그 외 객체/함수: 참조 동일성
 */
export function pointEquals(a: unknown, b: unknown): boolean {
  if (a === b || (Number.isNaN(a) && Number.isNaN(b))) {
    return true;
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  if (isEquatable(a)) {
    return a.equals(b);
  }
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) {
    return false;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => pointEquals(item, b[i]));
  }
  if (a instanceof Date && b instanceof Date) {
    return Object.is(a.getTime(), b.getTime());
  }
  if (a instanceof RegExp && b instanceof RegExp) {
    return a.source === b.source && a.flags === b.flags;
  }
  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) {
      return false;
    }
    for (const [key, value] of a) {
      if (!b.has(key) || !pointEquals(value, b.get(key))) {
        return false;
      }
    }
    return true;
  }
  if (a instanceof Set && b instanceof Set) {
    return a.size === b.size && [...a].every((item) => b.has(item));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) {
      return false;
    }
    return keys.every((key) => Object.hasOwn(b, key) && pointEquals(a[key], b[key]));
  }
  return false;
}

/** 두 인자 목록 비교 — 길이가 다르면 다른 포인트 */
export function argsEqual(a: readonly unknown[], b: readonly unknown[]): boolean {
  return a.length === b.length && a.every((item, i) => pointEquals(item, b[i]));
}

/**
 * 동등 비교를 평가할 수 없는 값을 찾는다.
 *
 * Promise/WeakMap/WeakSet/WeakRef와 순환 구조가 해당된다.
 * 문제가 있으면 { path, reason }, 없으면 undefined.
 */
export function findIncomparable(
  value: unknown,
  path = 'args',
  ancestors: object[] = [],
): { path: string; reason: string } | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  if (value instanceof Promise || isThenable(value)) {
    return { path, reason: 'a promise' };
  }
  if (value instanceof WeakMap || value instanceof WeakSet || value instanceof WeakRef) {
    return { path, reason: `a ${value.constructor.name}` };
  }
  if (isEquatable(value)) {
    return undefined;
  }
  if (ancestors.includes(value)) {
    return { path, reason: 'a cyclic structure' };
  }

  const next = [...ancestors, value];
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      const found = findIncomparable(value[i], `${path}[${i}]`, next);
      if (found) {
        return found;
      }
    }
    return undefined;
  }
  if (value instanceof Map) {
    for (const [key, item] of value) {
      const found = findIncomparable(item, `${path}.get(${String(key)})`, next);
      if (found) {
        return found;
      }
    }
    return undefined;
  }
  if (isPlainObject(value)) {
    for (const [key, item] of Object.entries(value)) {
      const found = findIncomparable(item, `${path}.${key}`, next);
      if (found) {
        return found;
      }
    }
  }
  return undefined;
}

/**
 * at() 시점의 인자 사본
 *
 * 배열, plain object, Map 값, Set, Date를 재귀 복사한다. 호출자가 at() 뒤에 원본을 바꿔도
 * 이미 만든 포인트는 그대로다. equals()를 가진 객체, 클래스 인스턴스, 함수, Map 키와
 * Set 원소는 참조 그대로 둔다 (비교도 참조/SameValueZero로 한다).
 * 순환 구조는 받지 않는다. findIncomparable을 먼저 통과한 값만 넘길 것.
 */
export function copyPoint(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || isEquatable(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => copyPoint(item));
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (value instanceof Map) {
    return new Map([...value].map(([key, item]): [unknown, unknown] => [key, copyPoint(item)]));
  }
  if (value instanceof Set) {
    return new Set(value);
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, unknown] => [key, copyPoint(item)]),
    );
    if (Object.getPrototypeOf(value) === null) {
      Object.setPrototypeOf(copy, null);
    }
    return copy;
  }
  return value;
}

function isEquatable(value: object): value is Equatable {
  return 'equals' in value && typeof value.equals === 'function';
}

function isThenable(value: object): boolean {
  return 'then' in value && typeof value.then === 'function';
}

