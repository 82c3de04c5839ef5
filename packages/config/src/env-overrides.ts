// packages/config/src/env-overrides.ts
import { isTruthyEnvValue } from '@whatif/infra';

interface EnvBinding {
  name: string;
  path: [string, string];
  parse: (value: string) => unknown;
}

/** 환경변수 → 설정 경로 매핑 */
const ENV_BINDINGS: readonly EnvBinding[] = [
  { name: 'WHATIF_LOG_LEVEL', path: ['logging', 'level'], parse: (v) => v.toLowerCase() },
  { name: 'WHATIF_LOG_FILE', path: ['logging', 'file'], parse: isTruthyEnvValue },
  { name: 'WHATIF_LOG_CONSOLE', path: ['logging', 'console'], parse: isTruthyEnvValue },
  { name: 'WHATIF_STRICT_BALANCE', path: ['engine', 'strictBalance'], parse: isTruthyEnvValue },
];

/**
 * WHATIF_* 환경변수에서 설정 조각 생성
 *
 * 빈 문자열은 미설정으로 취급한다. 값 검증은 Zod 단계에서 한다.
 */
export function resolveEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, Record<string, unknown>> = {};

  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.name];
    if (raw === undefined || raw === '') {
      continue;
    }
    const [section, key] = binding.path;
    result[section] = { ...result[section], [key]: binding.parse(raw) };
  }

  return result;
}
