/**
 * Console logging for plan/apply progress
 */

import chalk from 'chalk';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown): void;
  /** Logger whose messages carry `[key=value]` bindings */
  child(bindings: LogMeta): Logger;
}

export interface ConsoleLoggerOptions {
  /** Print debug messages and meta */
  verbose?: boolean;
  /** Sink for all output (default: stderr, so stdout stays clean for --json) */
  write?: (line: string) => void;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  return new ConsoleLogger(verbose, write, {});
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly verbose: boolean,
    private readonly write: (line: string) => void,
    private readonly bindings: LogMeta
  ) {}

  debug(message: string, meta?: LogMeta): void {
    if (!this.verbose) return;
    this.write(chalk.dim(`${this.prefix()}${message}${this.formatMeta(meta)}`));
  }

  info(message: string, meta?: LogMeta): void {
    this.write(`${this.prefix()}${message}${this.formatMeta(meta)}`);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write(chalk.yellow(`⚠️  ${this.prefix()}${message}${this.formatMeta(meta)}`));
  }

  error(message: string, error?: unknown): void {
    this.write(chalk.red(`${this.prefix()}${message}`));
    if (this.verbose && error instanceof Error && error.stack) {
      this.write(chalk.dim(error.stack));
    }
  }

  child(bindings: LogMeta): Logger {
    return new ConsoleLogger(this.verbose, this.write, { ...this.bindings, ...bindings });
  }

  private prefix(): string {
    const entries = Object.entries(this.bindings);
    if (entries.length === 0) return '';
    return `[${entries.map(([k, v]) => `${k}=${String(v)}`).join(' ')}] `;
  }

  private formatMeta(meta?: LogMeta): string {
    if (!this.verbose || !meta || Object.keys(meta).length === 0) return '';
    return ' ' + chalk.dim(JSON.stringify(meta));
  }
}

/**
 * Logger that drops everything; default for library callers
 */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => noopLogger,
};
