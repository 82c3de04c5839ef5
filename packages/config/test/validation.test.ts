// packages/config/test/validation.test.ts
import { describe, it, expect } from 'vitest';
import { validateConfig } from '../src/validation.js';

describe('validateConfig', () => {
  it('유효한 설정에 valid: true를 반환한다', () => {
    const result = validateConfig({ engine: { strictBalance: true } });
    expect(result.valid).toBe(true);
    expect(result.issues).toHaveLength(0);
    expect(result.config).toEqual({ engine: { strictBalance: true } });
  });

  it('잘못된 설정에 valid: false와 빈 config를 반환한다', () => {
    const result = validateConfig({ engine: { strictBalance: 'yes' } });
    expect(result.valid).toBe(false);
    expect(result.config).toEqual({});
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].path).toBe('engine.strictBalance');
    expect(result.issues[0].severity).toBe('error');
  });

  it('루트 수준 이슈는 (root) 경로를 갖는다', () => {
    const result = validateConfig({ gatway: {} });
    expect(result.valid).toBe(false);
    expect(result.issues[0].path).toBe('(root)');
  });
});
