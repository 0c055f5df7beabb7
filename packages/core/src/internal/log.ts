/**
 * Leveled logger with pluggable transports.
 * Silent until a transport is attached.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export type Transport = (entry: LogEntry) => void;

interface LoggerShared {
  level: LogLevel;
  transports: Transport[];
}

export class Logger {
  // Children share level and transports with their root
  private readonly shared: LoggerShared;
  private readonly context?: string;

  constructor(opts?: { level?: LogLevel; context?: string }, shared?: LoggerShared) {
    this.shared = shared ?? { level: opts?.level ?? 'info', transports: [] };
    this.context = opts?.context;
  }

  get level(): LogLevel {
    return this.shared.level;
  }

  setLevel(level: LogLevel): this {
    this.shared.level = level;
    return this;
  }

  addTransport(transport: Transport): this {
    this.shared.transports.push(transport);
    return this;
  }

  removeTransport(transport: Transport): this {
    const idx = this.shared.transports.indexOf(transport);
    if (idx !== -1) this.shared.transports.splice(idx, 1);
    return this;
  }

  child(context: string): Logger {
    return new Logger(
      { context: this.context ? `${this.context}.${context}` : context },
      this.shared
    );
  }

  isEnabled(level: LogLevel): boolean {
    return this.shared.transports.length > 0 && LEVELS[level] >= LEVELS[this.shared.level];
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
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = {
      level,
      message,
      context: this.context,
      timestamp: new Date().toISOString(),
      data,
    };
    for (const t of this.shared.transports) {
      t(entry);
    }
  }
}

export function stderrTransport(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  process.stderr.write(`${entry.timestamp} ${entry.level.toUpperCase()} ${prefix} ${entry.message}${data}\n`);
}

export const logger = new Logger({ context: 'frozen-collections' });
