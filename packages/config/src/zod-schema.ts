// packages/config/src/zod-schema.ts
import { z } from 'zod/v4';

/** 로깅 설정 스키마 */
const LoggingSchema = z.strictObject({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
  file: z.boolean(),
  console: z.boolean(),
});

/** 엔진 설정 스키마 */
const EngineSchema = z.strictObject({
  strictBalance: z.boolean(),
});

/** 루트 설정 스키마 — 모든 섹션/필드 optional */
export const WhatIfConfigSchema = z.strictObject({
  logging: LoggingSchema.partial().optional(),
  engine: EngineSchema.partial().optional(),
});

export type ValidatedWhatIfConfig = z.infer<typeof WhatIfConfigSchema>;
