/**
 * Console logger with chalk colors and a minimum level
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minLevel: LogLevel = 'info';

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export const logger = {
  setLevel(level: LogLevel): void {
    minLevel = level;
  },

  getLevel(): LogLevel {
    return minLevel;
  },

  debug(message: string): void {
    if (enabled('debug')) console.log(chalk.gray(`[debug] ${message}`));
  },

  info(message: string): void {
    if (enabled('info')) console.log(message);
  },

  success(message: string): void {
    if (enabled('info')) console.log(chalk.green(`✓ ${message}`));
  },

  dim(message: string): void {
    if (enabled('info')) console.log(chalk.gray(message));
  },

  warn(message: string): void {
    if (enabled('warn')) console.warn(chalk.yellow(`⚠ ${message}`));
  },

  error(message: string): void {
    if (enabled('error')) console.error(chalk.red(`✗ ${message}`));
  },
};
