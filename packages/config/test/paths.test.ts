// packages/config/test/paths.test.ts
import * as path from 'node:path';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { resolveConfigPath } from '../src/paths.js';

describe('resolveConfigPath', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('WHATIF_CONFIG_PATH를 최우선으로 사용한다', () => {
    expect(resolveConfigPath({ WHATIF_CONFIG_PATH: '/etc/whatif/custom.json5' })).toBe(
      path.resolve('/etc/whatif/custom.json5'),
    );
  });

  it('로컬 파일이 없으면 stateDir 아래 파일을 가리킨다', () => {
    vi.stubEnv('WHATIF_STATE_DIR', '/tmp/whatif-state');
    expect(resolveConfigPath({})).toBe(path.join('/tmp/whatif-state', 'whatif.config.json5'));
  });
});
