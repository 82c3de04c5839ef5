// packages/infra/src/logger-transports.ts
import * as fs from 'node:fs';
import * as path from 'node:path';
import { isPlainObject } from './objects.js';
import { getLogDir } from './paths.js';

export interface FileTransportConfig {
  enabled: boolean;
  /** 로그 디렉토리 (기본: getLogDir()) */
  path?: string;
  maxSizeMb?: number; // 기본: 10
  maxFiles?: number; // 기본: 5
}

/** 파일에 기록하는 한 줄 */
export interface LogRecord {
  time: string;
  level: string;
  logger?: string;
  msg: string;
  args?: unknown[];
}

const LOG_FILE_NAME = 'whatif.log';

/**
 * tslog 로그 객체 → LogRecord
 *
 * tslog는 인자를 "0", "1", ... 키에, 메타데이터를 _meta에 담는다.
 */
export function toLogRecord(logObj: Record<string, unknown>): LogRecord {
  const meta: Record<string, unknown> = isPlainObject(logObj._meta) ? logObj._meta : {};
  const positional = Object.keys(logObj)
    .filter((key) => /^\d+$/.test(key))
    .sort((a, b) => Number(a) - Number(b))
    .map((key) => logObj[key]);
  const [first, ...rest] = positional;

  const record: LogRecord = {
    time: meta.date instanceof Date ? meta.date.toISOString() : new Date().toISOString(),
    level: typeof meta.logLevelName === 'string' ? meta.logLevelName : 'UNKNOWN',
    msg: typeof first === 'string' ? first : JSON.stringify(first),
  };
  if (typeof meta.name === 'string') {
    record.logger = meta.name;
  }
  if (rest.length > 0) {
    record.args = rest;
  }
  return record;
}

/** 크기 기반 로테이션: whatif.log → whatif.log.1 → ... → whatif.log.(maxFiles-1) */
class RotatingLogFile {
  private stream: fs.WriteStream;
  private size: number;

  constructor(
    private readonly filePath: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {
    this.size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
    this.stream = this.open();
  }

  append(line: string): void {
    const bytes = Buffer.byteLength(line);
    if (this.size + bytes > this.maxBytes && this.size > 0) {
      this.stream.end();
      this.rotate();
      this.stream = this.open();
      this.size = 0;
    }
    this.size += bytes;
    this.stream.write(line);
  }

  /** 현재 스트림을 닫고 기록이 끝날 때까지 기다린다 */
  close(): Promise<void> {
    const stream = this.stream;
    return new Promise<void>((resolve) => {
      if (stream.writableFinished) {
        resolve();
      } else {
        stream.end(resolve);
      }
    });
  }

  private open(): fs.WriteStream {
    return fs.createWriteStream(this.filePath, { flags: 'a', mode: 0o600 });
  }

  private rotate(): void {
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = i === 1 ? this.filePath : `${this.filePath}.${i - 1}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.filePath}.${i}`);
      }
    }
  }
}

/**
 * tslog에 JSON 라인 파일 트랜스포트 부착
 *
 * 반환값은 flush 콜백 (비활성이면 undefined).
 */
export function attachFileTransport(
  logger: { attachTransport: (fn: (logObj: Record<string, unknown>) => void) => void },
  config: FileTransportConfig,
): (() => Promise<void>) | undefined {
  if (!config.enabled) {
    return undefined;
  }

  const logDir = config.path ?? getLogDir();
  fs.mkdirSync(logDir, { recursive: true });

  const file = new RotatingLogFile(
    path.join(logDir, LOG_FILE_NAME),
    (config.maxSizeMb ?? 10) * 1024 * 1024,
    config.maxFiles ?? 5,
  );

  logger.attachTransport((logObj) => {
    file.append(JSON.stringify(toLogRecord(logObj)) + '\n');
  });

  return () => file.close();
}
