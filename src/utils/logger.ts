import { createEnum } from './create-enum.js';

const logLevel = createEnum(['debug', 'info', 'success', 'warning', 'error', 'silent'] as const);

/**
 * Log level
 */
export const LogLevel = logLevel.object;

export type LogLevel = typeof logLevel.type;

export const LogLevelSchema = logLevel.schema;

const LEVEL_PRIORITIES = {
  debug: 0,
  info: 1,
  success: 2,
  warning: 3,
  error: 4,
  silent: 5,
} as const satisfies Record<LogLevel, number>;

/**
 * Logger configuration, shared by a logger and all of its children
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: colors.dim,
  info: colors.blue,
  success: colors.green,
  warning: colors.yellow,
  error: colors.red,
};

/**
 * Logger with colored console output and optional scope prefix
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly scope?: string;

  constructor(config: Partial<LoggerConfig> | LoggerConfig = {}, scope?: string) {
    this.config =
      isFullConfig(config)
        ? config
        : {
            level: config.level ?? LogLevel.INFO,
            useColors: config.useColors ?? process.stdout.isTTY === true,
          };
    this.scope = scope;
  }

  /**
   * Create a logger that prefixes every line with `[scope]`.
   * Level changes on the parent apply to the child.
   */
  child(scope: string): Logger {
    return new Logger(this.config, scope);
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.write(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.write(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setColors(useColors: boolean): void {
    this.config.useColors = useColors;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[this.config.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const prefix = this.scope ? `[${this.scope}] ` : '';
    const label = level.toUpperCase().padEnd(7);
    const line = `${formatDate(new Date())} ${this.colorize(label, LEVEL_COLORS[level])} ${prefix}${message}`;

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private colorize(text: string, color: string): string {
    if (!this.config.useColors) return text;
    return `${color}${text}${colors.reset}`;
  }
}

function isFullConfig(config: Partial<LoggerConfig>): config is LoggerConfig {
  return config.level !== undefined && config.useColors !== undefined;
}

/**
 * Format date to human readable string (MM-DD HH:mm:ss)
 */
function formatDate(date: Date): string {
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  const hour = date.getHours().toString().padStart(2, '0');
  const min = date.getMinutes().toString().padStart(2, '0');
  const sec = date.getSeconds().toString().padStart(2, '0');
  return `${month}-${day} ${hour}:${min}:${sec}`;
}

// Default logger instance
export const logger: Logger = new Logger();
