// packages/config/test/io.test.ts
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { createConfigIO, loadConfig, clearConfigCache } from '../src/io.js';

describe('createConfigIO', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'whatif-io-test-'));
    clearConfigCache();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    clearConfigCache();
  });

  function writeJson5(filename: string, content: string): string {
    const filePath = path.join(tmpDir, filename);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  it('설정 파일이 없으면 기본값을 반환한다', () => {
    const io = createConfigIO({ configPath: path.join(tmpDir, 'nonexistent.json5'), env: {} });
    const config = io.loadConfig();
    expect(config.logging.level).toBe('info');
    expect(config.engine.strictBalance).toBe(false);
  });

  it('JSON5 설정 파일에서 값을 읽는다', () => {
    const cfgPath = writeJson5(
      'whatif.config.json5',
      "{\n  // 주석 허용\n  engine: { strictBalance: true },\n  logging: { level: 'warn' },\n}",
    );
    const config = createConfigIO({ configPath: cfgPath, env: {} }).loadConfig();
    expect(config.engine.strictBalance).toBe(true);
    expect(config.logging.level).toBe('warn');
  });

  it('환경변수가 파일 값을 덮어쓴다', () => {
    const cfgPath = writeJson5('whatif.config.json5', "{ logging: { level: 'warn' } }");
    const io = createConfigIO({ configPath: cfgPath, env: { WHATIF_LOG_LEVEL: 'error' } });
    expect(io.loadConfig().logging.level).toBe('error');
  });

  it('검증 실패 시 경고를 남기고 기본값을 쓴다', () => {
    const cfgPath = writeJson5('whatif.config.json5', '{ engine: { strictBalance: 42 } }');
    const logger = { warn: vi.fn(), debug: vi.fn() };
    const config = createConfigIO({ configPath: cfgPath, env: {}, logger }).loadConfig();
    expect(config.engine.strictBalance).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toContain('[engine.strictBalance]');
  });

  it('파싱할 수 없는 파일은 ConfigError를 throw한다', () => {
    const cfgPath = writeJson5('whatif.config.json5', '{ engine: ');
    const io = createConfigIO({ configPath: cfgPath, env: {} });
    expect(() => io.loadConfig()).toThrow(ConfigError);
  });

  it('루트가 객체가 아니면 ConfigError를 throw한다', () => {
    const cfgPath = writeJson5('whatif.config.json5', '[1, 2]');
    expect(() => createConfigIO({ configPath: cfgPath, env: {} }).loadConfig()).toThrow(
      'Config root must be an object',
    );
  });

  it('캐시가 작동하고 invalidateCache로 다시 읽는다', () => {
    const cfgPath = writeJson5('whatif.config.json5', "{ logging: { level: 'debug' } }");
    const io = createConfigIO({ configPath: cfgPath, env: {} });

    const first = io.loadConfig();
    expect(io.loadConfig()).toBe(first);

    writeJson5('whatif.config.json5', "{ logging: { level: 'fatal' } }");
    io.invalidateCache();
    expect(io.loadConfig().logging.level).toBe('fatal');
  });

  it('주입된 fs를 사용한다', () => {
    const fakeFs = { readFileSync: vi.fn(() => '{ engine: { strictBalance: true } }') };
    const io = createConfigIO({ configPath: '/virtual/whatif.json5', env: {}, fs: fakeFs });
    expect(io.loadConfig().engine.strictBalance).toBe(true);
    expect(fakeFs.readFileSync).toHaveBeenCalledWith('/virtual/whatif.json5', 'utf-8');
  });
});

describe('loadConfig (싱글턴)', () => {
  afterEach(() => {
    clearConfigCache();
  });

  it('deps 없이 반복 호출하면 같은 결과를 재사용한다', () => {
    const deps = { configPath: '/nonexistent/whatif.json5', env: {} };
    const first = loadConfig(deps);
    expect(loadConfig()).toBe(first);
  });
});
