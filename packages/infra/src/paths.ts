// packages/infra/src/paths.ts
import * as os from 'node:os';
import * as path from 'node:path';
import { getEnv } from './env.js';

/** whatif 상태 디렉토리 (설정/로그의 루트) */
export function getStateDir(): string {
  return getEnv('STATE_DIR') || path.join(os.homedir(), '.whatif');
}

/** 로그 디렉토리 */
export function getLogDir(): string {
  return path.join(getStateDir(), 'logs');
}

/** 사용자 설정 파일 경로 */
export function getConfigFilePath(): string {
  return path.join(getStateDir(), 'whatif.config.json5');
}
