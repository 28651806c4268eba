import chalk from 'chalk';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  error(message: string): void {
    this.log('error', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, message: string) {
    if (!this.enabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}]`;

    switch (level) {
      case 'info':
        console.log(chalk.gray(prefix), chalk.cyan(message));
        break;
      case 'warn':
        console.log(chalk.gray(prefix), chalk.yellow(message));
        break;
      case 'error':
        console.error(chalk.gray(prefix), chalk.red(message));
        break;
      case 'debug':
        console.log(chalk.gray(prefix), chalk.gray(message));
        break;
    }
  }
}

export const logger = new Logger();
