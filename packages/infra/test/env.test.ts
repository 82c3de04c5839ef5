import { describe, it, expect, vi, afterEach } from 'vitest';
import { getEnv, isTruthyEnvValue } from '../src/env.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('getEnv', () => {
  it('WHATIF_ 접두사 변수를 우선 반환한다', () => {
    vi.stubEnv('WHATIF_LOG_LEVEL', 'debug');
    vi.stubEnv('LOG_LEVEL', 'warn');
    expect(getEnv('LOG_LEVEL')).toBe('debug');
  });

  it('WHATIF_ 없으면 접두사 없는 키를 반환한다', () => {
    expect(getEnv('HOST', undefined, { HOST: 'localhost' })).toBe('localhost');
  });

  it('둘 다 없으면 fallback을 반환한다', () => {
    expect(getEnv('MISSING', 'default', {})).toBe('default');
    expect(getEnv('MISSING', undefined, {})).toBeUndefined();
  });
});

describe('isTruthyEnvValue', () => {
  it.each([
    ['1', true],
    ['true', true],
    ['TRUE', true],
    ['yes', true],
    ['0', false],
    ['false', false],
    ['', false],
    [undefined, false],
  ])('%s → %s', (value, expected) => {
    expect(isTruthyEnvValue(value)).toBe(expected);
  });
});
