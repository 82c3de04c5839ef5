// packages/config/src/io.ts
import { isPlainObject } from '@whatif/infra';
import * as JSON5 from 'json5';
import * as fs from 'node:fs';
import type { ConfigDeps } from './types.js';
import { applyDefaults, type ResolvedWhatIfConfig } from './defaults.js';
import { resolveEnvOverrides } from './env-overrides.js';
import { ConfigError } from './errors.js';
import { mergeConfig } from './merge-config.js';
import { resolveConfigPath } from './paths.js';
import { validateConfig } from './validation.js';

/** ConfigIO — 설정 읽기 파사드 */
export interface ConfigIO {
  /** 4단계 파이프라인으로 설정 로드 (결과는 invalidateCache 전까지 캐시) */
  loadConfig(): ResolvedWhatIfConfig;
  /** 캐시 무효화 */
  invalidateCache(): void;
  /** 현재 설정 파일 경로 */
  readonly configPath: string;
}

/**
 * ConfigIO 팩토리
 *
 * 4단계 파이프라인:
 *   1. 파일 읽기 (JSON5, 없으면 {})
 *   2. 환경변수 오버라이드 병합
 *   3. Zod 검증 (실패 시 경고 후 {})
 *   4. 기본값 적용
 */
export function createConfigIO(deps: ConfigDeps = {}): ConfigIO {
  const fsModule = deps.fs ?? fs;
  const json5Module = deps.json5 ?? JSON5;
  const env = deps.env ?? process.env;
  const configPath = deps.configPath ?? resolveConfigPath(env);
  const logger = deps.logger;
  let cached: ResolvedWhatIfConfig | null = null;

  function readConfigFile(): Record<string, unknown> {
    let content: string;
    try {
      content = fsModule.readFileSync(configPath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        logger?.debug(`Config file not found: ${configPath}, using defaults`);
        return {};
      }
      throw new ConfigError(`Failed to read config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    let parsed: unknown;
    try {
      parsed = json5Module.parse(content);
    } catch (err) {
      throw new ConfigError(`Failed to parse config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config root must be an object: ${configPath}`);
    }
    return parsed;
  }

  function loadConfig(): ResolvedWhatIfConfig {
    if (cached) {
      return cached;
    }

    // 1. 파일 읽기
    const raw = readConfigFile();

    // 2. 환경변수 오버라이드
    const merged = mergeConfig(raw, resolveEnvOverrides(env));

    // 3. Zod 검증
    const validation = validateConfig(merged);
    if (!validation.valid) {
      for (const issue of validation.issues) {
        logger?.warn(`Config issue [${issue.path}]: ${issue.message}`);
      }
    }

    // 4. 기본값 적용
    cached = applyDefaults(validation.config);
    return cached;
  }

  return {
    loadConfig,
    invalidateCache: () => {
      cached = null;
    },
    get configPath() {
      return configPath;
    },
  };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

// ─── 모듈 레벨 래퍼 (편의) ───

let defaultIO: ConfigIO | null = null;
let defaultDeps: ConfigDeps | undefined;

/**
 * 기본 ConfigIO로 설정 로드 (싱글턴).
 * deps가 이전 호출과 다르면 내부 IO를 재생성한다.
 */
export function loadConfig(deps?: ConfigDeps): ResolvedWhatIfConfig {
  if (!defaultIO || (deps && deps !== defaultDeps)) {
    defaultDeps = deps;
    defaultIO = createConfigIO(deps);
  }
  return defaultIO.loadConfig();
}

/** 기본 ConfigIO 캐시 초기화 */
export function clearConfigCache(): void {
  defaultIO = null;
  defaultDeps = undefined;
}
