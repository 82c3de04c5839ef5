// packages/config/src/defaults.ts
import type { WhatIfConfig } from '@whatif/types';

/** 모든 필드가 채워진 설정 */
export interface ResolvedWhatIfConfig {
  logging: Required<NonNullable<WhatIfConfig['logging']>>;
  engine: Required<NonNullable<WhatIfConfig['engine']>>;
}

/**
 * 불변 기본값
 *
 * Zod .default()를 쓰지 않는 이유: 파이프라인에서 명시적 단계로 분리.
 */
const DEFAULTS: Readonly<ResolvedWhatIfConfig> = Object.freeze<ResolvedWhatIfConfig>({
  logging: {
    level: 'info',
    file: false,
    console: true,
  },
  engine: {
    strictBalance: false,
  },
});

/** 기본값을 유저 설정에 병합 (유저 값 우선) */
export function applyDefaults(userConfig: WhatIfConfig): ResolvedWhatIfConfig {
  const { logging, engine } = userConfig;
  return {
    logging: {
      level: logging?.level ?? DEFAULTS.logging.level,
      file: logging?.file ?? DEFAULTS.logging.file,
      console: logging?.console ?? DEFAULTS.logging.console,
    },
    engine: {
      strictBalance: engine?.strictBalance ?? DEFAULTS.engine.strictBalance,
    },
  };
}
