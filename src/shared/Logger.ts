export type LogLevel = 'debug' | 'verbose' | 'info' | 'warn' | 'error';

export type LogSink = (line: string) => void;

const LEVELS: Record<LogLevel, number> = {
  debug: 0, verbose: 1, info: 2, warn: 3, error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/** 未指定 minLevel 時：CATSEARCH_LOG_LEVEL → info */
function resolveDefaultLevel(): LogLevel {
  const fromEnv = process.env.CATSEARCH_LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

/** 結構化 JSON logger（一律寫 stderr，stdout 保留給 CLI / MCP stdio 輸出） */
export class Logger {
  private readonly minLevel: LogLevel;

  constructor(
    private readonly context: string,
    minLevel?: LogLevel,
    private readonly sink: LogSink = stderrSink,
  ) {
    this.minLevel = minLevel ?? resolveDefaultLevel();
  }

  /** 同一 sink 與 level，不同 context */
  child(context: string): Logger {
    return new Logger(`${this.context}.${context}`, this.minLevel, this.sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    this.sink(JSON.stringify(entry));
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  verbose(msg: string, data?: Record<string, unknown>) { this.log('verbose', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

/** 將未知錯誤轉為可記錄的字串 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'unknown error';
}
