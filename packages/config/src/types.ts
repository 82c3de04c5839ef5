import type { WhatIfLogger } from '@whatif/infra';

/**
 * ConfigDeps -- createConfigIO()에 주입하는 의존성 인터페이스
 */
export interface ConfigDeps {
  fs?: { readFileSync(path: string, encoding: 'utf-8'): string };
  json5?: { parse(text: string): unknown };
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  logger?: Pick<WhatIfLogger, 'warn' | 'debug'>;
}
