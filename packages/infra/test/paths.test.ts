import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { getStateDir, getLogDir, getConfigFilePath } from '../src/paths.js';

describe('paths', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('비어 있으면 기본 stateDir ~/.whatif 를 쓴다', () => {
    vi.stubEnv('WHATIF_STATE_DIR', '');
    vi.stubEnv('STATE_DIR', '');
    expect(getStateDir()).toBe(path.join(os.homedir(), '.whatif'));
  });

  it('WHATIF_STATE_DIR 환경 변수로 재정의된다', () => {
    vi.stubEnv('WHATIF_STATE_DIR', '/tmp/custom');
    expect(getStateDir()).toBe('/tmp/custom');
  });

  it('logDir과 설정 파일은 stateDir 아래에 있다', () => {
    vi.stubEnv('WHATIF_STATE_DIR', '/tmp/test');
    expect(getLogDir()).toBe(path.join('/tmp/test', 'logs'));
    expect(getConfigFilePath()).toBe(path.join('/tmp/test', 'whatif.config.json5'));
  });
});
