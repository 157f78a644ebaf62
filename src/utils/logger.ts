import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];
}

/**
 * Console logger honouring LOG_LEVEL. Messages carry their own emoji prefix,
 * the same way the rest of the daemon writes to the console.
 */
export const logger = {
  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(chalk.red(message), ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(chalk.yellow(message), ...args);
  },
  info(message: string, ...args: unknown[]): void {
    if (enabled('info')) console.log(message, ...args);
  },
  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.log(chalk.gray(message), ...args);
  },
  trace(message: string, ...args: unknown[]): void {
    if (enabled('trace')) console.log(chalk.dim(message), ...args);
  },
};
