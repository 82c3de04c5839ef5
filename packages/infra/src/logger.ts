import type { LogLevel } from '@whatif/types';
// packages/infra/src/logger.ts
import { Logger as TsLogger } from 'tslog';
import { attachFileTransport, type FileTransportConfig } from './logger-transports.js';

export interface LoggerConfig {
  name: string;
  level?: LogLevel;
  file?: FileTransportConfig;
  console?: {
    enabled: boolean;
    pretty?: boolean; // 기본: !isCI
  };
  redactKeys?: string[];
}

/** 로거 팩토리 인터페이스 — DI/테스트 교체 지점 */
export interface LoggerFactory {
  create(config: LoggerConfig): WhatIfLogger;
}

export interface WhatIfLogger {
  trace(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  fatal(msg: string, ...args: unknown[]): void;
  child(name: string): WhatIfLogger;
  flush(): Promise<void>;
}

const DEFAULT_REDACT_KEYS = ['token', 'password', 'secret', 'apiKey', 'api_key', 'authorization'];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/** whatif 로거 팩토리 (기본 구현) */
export function createLogger(config: LoggerConfig): WhatIfLogger {
  const isCI = process.env.CI === 'true';
  const consoleEnabled = config.console?.enabled ?? true;
  const pretty = config.console?.pretty ?? !isCI;
  const tsLogger = new TsLogger<Record<string, unknown>>({
    name: config.name,
    minLevel: LOG_LEVEL_MAP[config.level ?? 'info'],
    type: consoleEnabled ? (pretty ? 'pretty' : 'json') : 'hidden',
    maskValuesOfKeys: config.redactKeys ?? DEFAULT_REDACT_KEYS,
    hideLogPositionForProduction: true,
  });

  const flushCallbacks: (() => Promise<void>)[] = [];
  if (config.file?.enabled) {
    const flush = attachFileTransport(tsLogger, config.file);
    if (flush) {
      flushCallbacks.push(flush);
    }
  }

  return wrapLogger(tsLogger, flushCallbacks);
}

/** tslog 인스턴스를 WhatIfLogger로 래핑 */
function wrapLogger(
  tsLogger: TsLogger<Record<string, unknown>>,
  flushCallbacks: (() => Promise<void>)[],
): WhatIfLogger {
  return {
    trace: (msg, ...args) => tsLogger.trace(msg, ...args),
    debug: (msg, ...args) => tsLogger.debug(msg, ...args),
    info: (msg, ...args) => tsLogger.info(msg, ...args),
    warn: (msg, ...args) => tsLogger.warn(msg, ...args),
    error: (msg, ...args) => tsLogger.error(msg, ...args),
    fatal: (msg, ...args) => tsLogger.fatal(msg, ...args),
    // 서브 로거는 부모의 트랜스포트를 공유하므로 flush 대상도 공유한다
    child: (name: string) => wrapLogger(tsLogger.getSubLogger({ name }), flushCallbacks),
    flush: async () => {
      await Promise.all(flushCallbacks.map((fn) => fn()));
    },
  };
}

/** 기본 LoggerFactory 구현 */
export const defaultLoggerFactory: LoggerFactory = {
  create: createLogger,
};
