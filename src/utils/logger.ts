export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  scope?: string;
  /** Defaults to stderr. */
  write?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  /** Same sink and level, nested scope (`session:s-1:draft`). */
  child(scope: string): Logger {
    const nested = this.opts.scope ? `${this.opts.scope}:${scope}` : scope;
    return new Logger({ ...this.opts, scope: nested });
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const timestamp = new Date().toISOString();
    const scope = this.opts.scope;
    const write = this.opts.write ?? ((line: string) => process.stderr.write(line));

    if (this.opts.json) {
      write(`${safeJson({ timestamp, level, scope, message, data })}\n`);
      return;
    }

    const head = scope ? `${timestamp} ${level} [${scope}] ${message}` : `${timestamp} ${level} ${message}`;
    const line = data === undefined ? head : `${head} ${safeJson(data)}`;
    write(`${line}\n`);
  }
}

/** Logger that drops everything; used where a caller supplies none. */
export const silentLogger = new Logger({ level: 'error', write: () => {} });

function errorReplacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v, errorReplacer);
  } catch {
    return '"[unserializable]"';
  }
}
