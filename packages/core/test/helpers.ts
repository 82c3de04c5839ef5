// packages/core/test/helpers.ts
import type { WhatIfLogger } from '@whatif/infra';
import { vi } from 'vitest';

/** debug 메시지를 log 배열에 쌓고 warn은 스파이로 남기는 로거 */
export function createRecordingLogger(log: string[] = []) {
  const noop = () => {};
  const logger = {
    trace: noop,
    debug: (msg: string) => {
      log.push(msg);
    },
    info: noop,
    warn: vi.fn<(msg: string, ...args: unknown[]) => void>(),
    error: noop,
    fatal: noop,
    child: (): WhatIfLogger => logger,
    flush: async () => {},
  };
  return logger;
}
