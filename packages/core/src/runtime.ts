// packages/core/src/runtime.ts
import { loadConfig } from '@whatif/config';
import { defaultLoggerFactory, type LoggerFactory, type WhatIfLogger } from '@whatif/infra';

/** imaginable()에 옵션이 없을 때 쓰는 엔진 전역 기본값 */
export interface EngineDefaults {
  logger: WhatIfLogger;
  strictBalance: boolean;
}

export interface BootstrapOptions {
  /** 엔진 로거 생성기 (기본: defaultLoggerFactory) */
  loggerFactory?: LoggerFactory;
}

interface PendingLog {
  level: 'warn' | 'debug';
  msg: string;
}

let defaults: EngineDefaults | null = null;

/**
 * 설정을 읽어 엔진 기본값을 만든다.
 *
 * 로거 설정 자체가 설정 파일에 있으므로, 로드 중 나온 메시지는 모아 두었다가
 * 설정으로 만든 로거가 생긴 뒤 그 로거로 남긴다.
 */
export function bootstrapEngine(options: BootstrapOptions = {}): EngineDefaults {
  const factory = options.loggerFactory ?? defaultLoggerFactory;
  const pending: PendingLog[] = [];
  const { logging, engine } = loadConfig({
    logger: {
      warn: (msg) => {
        pending.push({ level: 'warn', msg });
      },
      debug: (msg) => {
        pending.push({ level: 'debug', msg });
      },
    },
  });

  const logger = factory.create({
    name: 'whatif',
    level: logging.level,
    console: { enabled: logging.console },
    file: { enabled: logging.file },
  });
  for (const entry of pending) {
    logger[entry.level](entry.msg);
  }

  defaults = { logger, strictBalance: engine.strictBalance };
  return defaults;
}

/** 최초 호출 시 bootstrapEngine()으로 기본값을 만든다 */
export function getEngineDefaults(): EngineDefaults {
  return defaults ?? bootstrapEngine();
}

/** 이후 생성되는 래핑 함수의 기본값 교체 (이미 만든 대상에는 영향 없음) */
export function configureEngine(overrides: Partial<EngineDefaults>): void {
  const current = getEngineDefaults();
  defaults = {
    logger: overrides.logger ?? current.logger,
    strictBalance: overrides.strictBalance ?? current.strictBalance,
  };
}

/** 테스트용 상태 초기화 */
export function resetEngineDefaults(): void {
  defaults = null;
}
