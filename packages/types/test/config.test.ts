import type { WhatIfConfig, ConfigValidationIssue, LogLevel } from '@whatif/types';
import { describe, it, expectTypeOf } from 'vitest';

describe('WhatIfConfig', () => {
  it('빈 객체가 유효한 WhatIfConfig이다 (모든 필드 optional)', () => {
    const config: WhatIfConfig = {};
    expectTypeOf(config).toMatchTypeOf<WhatIfConfig>();
  });

  it('logging, engine 최상위 필드를 가질 수 있다', () => {
    const config: WhatIfConfig = {
      logging: { level: 'debug', file: false },
      engine: { strictBalance: true },
    };
    expectTypeOf(config).toMatchTypeOf<WhatIfConfig>();
  });

  it('logging.level은 LogLevel이다', () => {
    expectTypeOf<NonNullable<WhatIfConfig['logging']>['level']>().toEqualTypeOf<
      LogLevel | undefined
    >();
  });
});

describe('ConfigValidationIssue', () => {
  it('path, message, severity 필드를 갖는다', () => {
    expectTypeOf<ConfigValidationIssue>().toHaveProperty('path');
    expectTypeOf<ConfigValidationIssue>().toHaveProperty('message');
    expectTypeOf<ConfigValidationIssue>().toHaveProperty('severity');
  });
});
