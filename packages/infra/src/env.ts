// packages/infra/src/env.ts
const WHATIF_PREFIX = 'WHATIF_';

/**
 * 환경 변수 조회
 *
 * WHATIF_ 접두사를 우선 검색하고, 없으면 접두사 없는 키를 검색.
 */
export function getEnv(
  key: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  return env[`${WHATIF_PREFIX}${key}`] ?? env[key] ?? fallback;
}

/** truthy 환경 변수 판별 ('1', 'true', 'yes') */
export function isTruthyEnvValue(value: string | undefined): boolean {
  return value != null && ['1', 'true', 'yes'].includes(value.toLowerCase());
}
