/**
 * Structured logging infrastructure.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogOutput = 'stdout' | 'stderr';

/**
 * Simple structured logger for the accessorize CLI and driver.
 *
 * Debug and info lines go to stdout unless the output is switched to
 * stderr, which keeps stdout free for patched source text.
 */
class Logger {
  private level: LogLevel = 'info';
  private output: LogOutput = 'stdout';
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setOutput(output: LogOutput): void {
    this.output = output;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private print(text: string): void {
    if (this.output === 'stderr') {
      console.error(text);
    } else {
      console.log(text);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.print(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      this.print(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.print(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      this.print(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * A logger that shares this one's settings and nests `prefix` under its own.
   * Settings are copied when the child is created.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.output = this.output;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
