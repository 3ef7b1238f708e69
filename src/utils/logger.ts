/**
 * Leveled logging for the CLI and the engine's debug traces.
 *
 * Everything goes to stderr so that reports printed on stdout (notably the
 * JSON format) stay machine-readable.
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

type Paint = (text: string) => string;

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private colors: boolean = true;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  setColors(enabled: boolean): void {
    this.colors = enabled;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(paint: Paint, tag: string, message: string, data?: Record<string, unknown>): void {
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    console.error(this.paint(paint, `${tag} ${text}`));
    if (data) {
      console.error(this.paint(paint, JSON.stringify(data, null, 2)));
    }
  }

  private paint(paint: Paint, text: string): string {
    return this.colors ? paint(text) : text;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('debug')) return;
    this.write(chalk.gray, '[DEBUG]', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('info')) return;
    this.write(chalk.blue, '[INFO]', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('warn')) return;
    this.write(chalk.yellow, '[WARN]', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    this.write(chalk.red, '[ERROR]', message);
    if (error instanceof Error) {
      const detail = this.level === 'debug' ? error.stack ?? error.message : error.message;
      console.error(this.paint(chalk.red, detail));
    } else if (error) {
      console.error(this.paint(chalk.red, JSON.stringify(error, null, 2)));
    }
  }

  success(message: string): void {
    if (!this.isEnabled('info')) return;
    console.error(this.paint(chalk.green, `✓ ${message}`));
  }

  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    console.error(this.paint(chalk.red, `✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix. Level and colour settings are
   * copied at creation time.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.colors = this.colors;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
