import chalk from 'chalk';
import ora, { type Ora } from 'ora';

let verboseEnabled = false;

/**
 * Enable or disable verbose (debug) output.
 */
export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

/**
 * The sink the clients write diagnostics to. Any object with these
 * methods (pino, console, a test spy) can be passed in place of `logger`.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Colour-coded logger. Everything goes to stderr; stdout is reserved for
 * command output.
 */
export const logger = {
  /** Informational message (blue). */
  info(message: string, ...args: unknown[]): void {
    console.error(chalk.blue('info'), message, ...args);
  },

  /** Warning message (yellow). */
  warn(message: string, ...args: unknown[]): void {
    console.error(chalk.yellow('warn'), message, ...args);
  },

  /** Error message (red). */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red('error'), message, ...args);
  },

  /** Success message (green). */
  success(message: string, ...args: unknown[]): void {
    console.error(chalk.green('success'), message, ...args);
  },

  /** Debug message (gray). Only printed when verbose mode is enabled. */
  debug(message: string, ...args: unknown[]): void {
    if (verboseEnabled) {
      console.error(chalk.gray('debug'), message, ...args);
    }
  },
};

/**
 * Create an ora spinner with the given text.
 * The spinner is returned in a stopped state -- call `.start()` to begin.
 */
export function createSpinner(text: string): Ora {
  return ora({ text, stream: process.stderr });
}
