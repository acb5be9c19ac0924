import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { LOG_LEVELS, type LogLevel } from '@archscope/core';

// silent=0, error=1, warn=2, info=3, verbose=4
let configuredLevel: LogLevel = 'info';
let pinned = false;

function toLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

/**
 * Set the level from settings; ARCHSCOPE_LOG_LEVEL still wins when set.
 * A pinned level (`--json`) ignores the environment.
 */
export function setLogLevel(level: LogLevel, opts: { pin?: boolean } = {}): void {
  configuredLevel = level;
  pinned = opts.pin ?? false;
}

export function getLogLevel(): LogLevel {
  if (pinned) return configuredLevel;
  return toLogLevel(process.env['ARCHSCOPE_LOG_LEVEL']?.toLowerCase()) ?? configuredLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(getLogLevel());
}

export const logger = {
  info(message: string): void {
    if (shouldLog('info')) console.log(chalk.blue('  i ') + message);
  },

  warn(message: string): void {
    if (shouldLog('warn')) console.log(chalk.yellow('  ! ') + chalk.yellow(message));
  },

  error(message: string): void {
    if (shouldLog('error')) console.error(chalk.red('  x ') + chalk.red(message));
  },

  success(message: string): void {
    if (shouldLog('info')) console.log(chalk.green('  v ') + chalk.green(message));
  },

  /** Only shown at verbose */
  debug(message: string): void {
    if (shouldLog('verbose')) console.log(chalk.gray('  . ' + message));
  },

  dim(message: string): void {
    if (shouldLog('info')) console.log(chalk.dim('    ' + message));
  },

  header(message: string): void {
    if (shouldLog('info')) {
      console.log('\n' + chalk.bold.cyan(message));
      console.log(chalk.dim('─'.repeat(Math.min(message.length, 60))));
    }
  },

  step(message: string): void {
    if (shouldLog('info')) console.log(chalk.cyan('  > ') + message);
  },

  blank(): void {
    if (shouldLog('info')) console.log('');
  },
};

/**
 * Create and start an ora spinner. Silent when the log level hides info
 * output, so `--json` runs print nothing but the document.
 */
export function spinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
    isSilent: !shouldLog('info'),
  }).start();
}
