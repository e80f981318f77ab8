export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export interface LoggerOptions {
  namespace?: string;
  minLevel?: LogThreshold;
}

const levelPriority: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class Logger {
  readonly namespace?: string;
  private minLevel: LogThreshold;

  constructor(options: LoggerOptions = {}) {
    this.namespace = options.namespace;
    this.minLevel = options.minLevel ?? 'info';
  }

  // Child loggers share the parent's threshold at creation time
  child(namespace: string): Logger {
    const name = this.namespace ? `${this.namespace}:${namespace}` : namespace;
    return new Logger({ namespace: name, minLevel: this.minLevel });
  }

  setMinLevel(level: LogThreshold): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.minLevel];
  }

  private prefix(level: LogLevel): string {
    const timestamp = new Date().toISOString();
    const ns = this.namespace ? `[${this.namespace}]` : '';
    return `[${timestamp}]${ns} ${level.toUpperCase()}:`;
  }

  debug(msg: string, ...args: unknown[]): void {
    if (this.isEnabled('debug')) console.debug(this.prefix('debug'), msg, ...args);
  }

  info(msg: string, ...args: unknown[]): void {
    if (this.isEnabled('info')) console.info(this.prefix('info'), msg, ...args);
  }

  warn(msg: string, ...args: unknown[]): void {
    if (this.isEnabled('warn')) console.warn(this.prefix('warn'), msg, ...args);
  }

  error(msg: string, ...args: unknown[]): void {
    if (this.isEnabled('error')) console.error(this.prefix('error'), msg, ...args);
  }
}
