/**
 * CLI logger.
 *
 * Level-tagged messages go to stderr; stdout carries command output and the
 * per-file check marks.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Paint = (text: string) => string;

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private emit(paint: Paint, tag: string, message: string): void {
    console.error(paint(`[${tag}] ${message}`));
  }

  /** `data` is printed as indented JSON under the message. */
  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    this.emit(chalk.gray, 'DEBUG', message);
    if (data) console.error(chalk.gray(JSON.stringify(data, null, 2)));
  }

  info(message: string): void {
    if (this.enabled('info')) this.emit(chalk.blue, 'INFO', message);
  }

  error(message: string): void {
    if (this.enabled('error')) this.emit(chalk.red, 'ERROR', message);
  }

  /** ✓ mark on stdout, shown at info level and below. */
  success(message: string): void {
    if (this.enabled('info')) console.log(chalk.green(`✓ ${message}`));
  }

  /** ✗ mark on stdout, shown at info level and below. */
  fail(message: string): void {
    if (this.enabled('info')) console.log(chalk.red(`✗ ${message}`));
  }
}

export const logger = new Logger();

export { Logger };
