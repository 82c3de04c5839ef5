// packages/config/src/paths.ts
import { getConfigFilePath } from '@whatif/infra';
import * as fs from 'node:fs';
import * as path from 'node:path';

const LOCAL_CONFIG_FILE = 'whatif.config.json5';

/**
 * 설정 파일 경로 해석
 *
 * 우선순위:
 *   1. WHATIF_CONFIG_PATH 환경변수
 *   2. ./whatif.config.json5 (존재할 때)
 *   3. ~/.whatif/whatif.config.json5
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.WHATIF_CONFIG_PATH;
  if (envPath) {
    return path.resolve(envPath);
  }

  const localPath = path.resolve(LOCAL_CONFIG_FILE);
  if (fs.existsSync(localPath)) {
    return localPath;
  }

  return getConfigFilePath();
}
