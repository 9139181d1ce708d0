export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export type Transport = (entry: LogEntry) => void;

export class Logger {
  private transports: Transport[] = [];
  private level: LogLevel;
  private context?: string;

  constructor(opts?: { level?: LogLevel; context?: string }) {
    this.level = opts?.level ?? 'info';
    this.context = opts?.context;
  }

  addTransport(transport: Transport): this {
    this.transports.push(transport);
    return this;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  child(context: string): Logger {
    const child = new Logger({
      level: this.level,
      context: this.context ? `${this.context}.${context}` : context,
    });
    child.transports = this.transports;
    return child;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    const entry: LogEntry = {
      level,
      message,
      context: this.context,
      timestamp: new Date().toISOString(),
      data,
    };
    for (const t of this.transports) {
      try {
        t(entry);
      } catch (err) {
        process.stderr.write(`log transport failed: ${String(err)}\n`);
      }
    }
  }
}

export function formatEntry(entry: LogEntry): string {
  const prefix = entry.context ? `[${entry.context}]` : '';
  let line = `${entry.timestamp} ${entry.level.toUpperCase()} ${prefix} ${entry.message}`;
  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` ${JSON.stringify(entry.data)}`;
  }
  return line;
}

export function stderrTransport(entry: LogEntry): void {
  process.stderr.write(formatEntry(entry) + '\n');
}

/** Logger writing to stderr, the default for hosts. */
export function createLogger(level: LogLevel = 'info', context?: string): Logger {
  return new Logger({ level, context }).addTransport(stderrTransport);
}
