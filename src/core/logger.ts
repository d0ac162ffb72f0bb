// Logging for the impact analyzer; everything goes to stderr so stdout stays parseable

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
}

export type LogContext = Record<string, unknown>;

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  prefix: '[impact]',
  timestamps: false
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Level for a name such as "debug" or "WARN"; undefined when unknown
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  return name === undefined ? undefined : LEVEL_NAMES[name.trim().toLowerCase()];
}

/**
 * Scoped logger. Children share their root's level, so `--verbose` set once
 * on the root reaches every service logger created before it.
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly root: Logger | null;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}, root: Logger | null = null) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.root = root;
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger({ level: parseLogLevel(process.env.IMPACT_LOG_LEVEL) ?? DEFAULT_CONFIG.level });
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    if (this.root) {
      this.root.setLevel(level);
    } else {
      this.config.level = level;
    }
  }

  getLevel(): LogLevel {
    return this.root ? this.root.getLevel() : this.config.level;
  }

  child(scope: string): Logger {
    return new Logger(
      { ...this.config, prefix: `${this.config.prefix ?? ''}[${scope}]` },
      this.root ?? this
    );
  }

  /**
   * Runs one analysis phase and logs its duration at debug level
   */
  async timed<T>(phase: string, run: () => Promise<T> | T, context: LogContext = {}): Promise<T> {
    const started = performance.now();
    try {
      return await run();
    } finally {
      this.debug(`${phase} finished`, { ...context, durationMs: Math.round(performance.now() - started) });
    }
  }

  format(level: string, message: string, context?: LogContext): string {
    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }
    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }
    parts.push(`[${level}]`, message);
    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }
    return parts.join(' ');
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, 'INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, 'WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.ERROR, 'ERROR', message, context);
  }

  private write(level: LogLevel, name: string, message: string, context?: LogContext): void {
    if (this.getLevel() <= level) {
      console.error(this.format(name, message, context));
    }
  }
}

export const logger = Logger.getInstance();
