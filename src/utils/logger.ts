/**
 * Structured logging infrastructure.
 *
 * Everything goes to stderr so that report output on stdout stays clean
 * (and parseable when --json is used).
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Simple structured logger for the phonescope CLI.
 */
class Logger {
  private level?: LogLevel;
  private prefix: string = '';
  private parent?: Logger;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Children follow their parent's level until given one of their own.
   */
  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(paint: (text: string) => string, tag: string, message: string, data?: Record<string, unknown>): void {
    console.error(paint(`[${tag}] ${this.formatMessage(message)}`));
    if (data) {
      console.error(paint(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('debug')) return;
    this.write(chalk.gray, 'DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('info')) return;
    this.write(chalk.blue, 'INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('warn')) return;
    this.write(chalk.yellow, 'WARN', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (!error) return;
    if (error instanceof Error) {
      // Stack traces only help when debugging
      console.error(chalk.red(this.isEnabled('debug') ? error.stack || error.message : error.message));
    } else {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
