/**
 * Structured logging utility for the Barangay API
 *
 * One JSON object per line in production; elsewhere a compact
 * `12:00:00.000 INFO  [dataset] message key=value` line for terminals.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

const SERVICE = 'barangay-api';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONSOLE_METHODS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Process-wide level set at runtime (CLI --verbose / --quiet); wins over the
 * level each logger was created with.
 */
let levelOverride: LogLevel | undefined;

export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly pretty: boolean;
  /** Scope shown as `[module]` / `"module"`; omitted for the root logger */
  readonly module?: string;
  readonly now?: () => Date;
}

export class Logger {
  private readonly now: () => Date;

  constructor(private readonly options: LoggerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get module(): string | undefined {
    return this.options.module;
  }

  child(module: string): Logger {
    return new Logger({ ...this.options, module });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[levelOverride ?? this.options.level];
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  private write(level: LogLevel, message: string, metadata: LogMetadata = {}): void {
    if (!this.isEnabled(level)) return;
    const fields = Object.entries(metadata).filter(([, value]) => value !== undefined);
    const line = this.options.pretty
      ? this.formatPretty(level, message, fields)
      : this.formatJson(level, message, fields);
    CONSOLE_METHODS[level](line);
  }

  private formatPretty(
    level: LogLevel,
    message: string,
    fields: ReadonlyArray<[string, unknown]>
  ): string {
    const time = this.now().toISOString().slice(11, 23);
    const scope = this.options.module !== undefined ? ` [${this.options.module}]` : '';
    const pairs = fields.map(([key, value]) => ` ${key}=${logfmtValue(value)}`).join('');
    return `${time} ${level.toUpperCase().padEnd(5)}${scope} ${message}${pairs}`;
  }

  private formatJson(
    level: LogLevel,
    message: string,
    fields: ReadonlyArray<[string, unknown]>
  ): string {
    const entry: Record<string, unknown> = {
      time: this.now().toISOString(),
      level,
      service: SERVICE,
    };
    if (this.options.module !== undefined) entry.module = this.options.module;
    entry.message = message;
    for (const [key, value] of fields) {
      entry[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return JSON.stringify(entry);
  }
}

function logfmtValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'string') {
    return value !== '' && /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return undefined;
}

export const logger = new Logger({
  level: parseLogLevel(process.env.LOG_LEVEL) ?? 'info',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Logger scoped to a module, e.g. `createLogger({ module: 'dataset' })`
 */
export function createLogger(context: { readonly module: string }): Logger {
  return logger.child(context.module);
}
