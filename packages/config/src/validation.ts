import type { WhatIfConfig, ConfigValidationIssue } from '@whatif/types';
// packages/config/src/validation.ts
import { WhatIfConfigSchema } from './zod-schema.js';

export type ValidationResult =
  | { valid: true; config: WhatIfConfig; issues: [] }
  | { valid: false; config: WhatIfConfig; issues: ConfigValidationIssue[] };

/**
 * Zod 기반 2단계 검증
 *
 * 1. safeParse로 스키마 검증
 * 2. 실패 시 이슈를 경로 문자열과 함께 수집, 빈 {} 반환
 */
export function validateConfig(raw: unknown): ValidationResult {
  const result = WhatIfConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data, issues: [] };
  }

  const issues = result.error.issues.map(
    (issue): ConfigValidationIssue => ({
      path: formatPath(issue.path),
      message: issue.message,
      severity: 'error',
    }),
  );

  return { valid: false, config: {}, issues };
}

/** ['engine', 'strictBalance'] → 'engine.strictBalance', [] → '(root)' */
function formatPath(segments: readonly PropertyKey[]): string {
  let out = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${String(segment)}` : String(segment);
    }
  }
  return out || '(root)';
}
