export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (line: string) => void;

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

/** 環境變數 ARTISYNC_LOG_LEVEL 決定預設門檻 */
function defaultLevel(): LogLevel {
  const fromEnv = process.env.ARTISYNC_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

let globalLevel: LogLevel | undefined;

/** CLI 讀完設定後呼叫，之後建立的 logger 都套用 */
export function setDefaultLogLevel(level: LogLevel): void {
  globalLevel = level;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

/** 結構化 JSON logger，一律寫 stderr，stdout 留給指令輸出 */
export class Logger {
  private readonly minLevel: LogLevel;

  constructor(
    private readonly context: string,
    minLevel?: LogLevel,
    private readonly sink: LogSink = stderrSink,
  ) {
    this.minLevel = minLevel ?? globalLevel ?? defaultLevel();
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
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
