/**
 * Leveled console logging.
 *
 * Diagnostics go to stderr so that command output on stdout (paths, merged
 * documents) can be piped into other tools.
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

type LogData = Record<string, unknown>;

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: LogData): void {
    if (this.isEnabled('debug')) {
      this.write(console.error, chalk.gray, `[DEBUG] ${message}`, data);
    }
  }

  info(message: string, data?: LogData): void {
    if (this.isEnabled('info')) {
      this.write(console.error, chalk.blue, `[INFO] ${message}`, data);
    }
  }

  warn(message: string, data?: LogData): void {
    if (this.isEnabled('warn')) {
      this.write(console.warn, chalk.yellow, `[WARN] ${message}`, data);
    }
  }

  error(message: string, data?: LogData): void {
    if (this.isEnabled('error')) {
      this.write(console.error, chalk.red, `[ERROR] ${message}`, data);
    }
  }

  private write(
    sink: (line: string) => void,
    color: (text: string) => string,
    line: string,
    data: LogData | undefined
  ): void {
    sink(color(line));
    if (data) {
      sink(color(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
