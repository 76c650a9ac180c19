import chalk from 'chalk';
import type { LogLevel } from './config';

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Where formatted lines go. Generated text owns stdout, so this defaults to stderr. */
export type LogWriter = (line: string) => void;

function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (typeof arg === 'object' && arg !== null) {
        return arg instanceof Error ? arg.message : JSON.stringify(arg);
      }
      return String(arg);
    })
    .join(' ');
}

function formatLogMessage(tag: string, message: string, args: unknown[]): string {
  const rest = formatArgs(args);
  return rest.length > 0 ? `${tag} ${message} ${rest}` : `${tag} ${message}`;
}

export function createLogger(
  level: LogLevel,
  write: LogWriter = (line) => process.stderr.write(`${line}\n`),
): Logger {
  const threshold = RANK[level];
  const emit = (at: LogLevel, tag: string, message: string, args: unknown[]): void => {
    if (RANK[at] >= threshold) {
      write(formatLogMessage(tag, message, args));
    }
  };

  return {
    debug: (message, ...args) => emit('debug', chalk.dim('debug'), message, args),
    info: (message, ...args) => emit('info', chalk.cyan('info'), message, args),
    warn: (message, ...args) => emit('warn', chalk.yellow('warn'), message, args),
    error: (message, ...args) => emit('error', chalk.red('error'), message, args),
  };
}
