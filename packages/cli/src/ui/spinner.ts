/**
 * Spinner - Progress spinner and status markers
 *
 * Spinner and status output go to stderr so stdout carries only the
 * simulation log, summary or JSON document.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

/**
 * Spinner configuration options
 */
export interface SpinnerOptions {
  /** Spinner text */
  text?: string;
  /** Whether to animate (false in CI mode and off a terminal) */
  enabled?: boolean;
}

/**
 * Spinner wrapper for consistent CLI feedback
 */
export class Spinner {
  private spinner: Ora;
  private enabled: boolean;

  constructor(options: SpinnerOptions = {}) {
    this.enabled = options.enabled ?? (!process.env['CI'] && process.stderr.isTTY === true);

    const baseOptions = {
      color: 'cyan',
      isEnabled: this.enabled,
      // nothing at all is written when the spinner cannot animate
      isSilent: !this.enabled,
      stream: process.stderr,
    } as const;

    this.spinner = options.text
      ? ora({ ...baseOptions, text: options.text })
      : ora(baseOptions);
  }

  /**
   * Start the spinner with optional text
   */
  start(text?: string): this {
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Stop the spinner with a success message
   */
  succeed(text?: string): this {
    this.spinner.succeed(text);
    return this;
  }

  /**
   * Stop the spinner with a failure message
   */
  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

/**
 * Create a new spinner instance
 */
export function createSpinner(textOrOptions?: string | SpinnerOptions): Spinner {
  if (typeof textOrOptions === 'string') {
    return new Spinner({ text: textOrOptions });
  }
  return new Spinner(textOrOptions);
}

/**
 * Status indicators for non-spinner output
 */
export const status = {
  success(message: string): void {
    console.error(chalk.green('✔'), message);
  },

  error(message: string): void {
    console.error(chalk.red('✖'), message);
  },

  warning(message: string): void {
    console.error(chalk.yellow('⚠'), message);
  },

  info(message: string): void {
    console.error(chalk.blue('ℹ'), message);
  },
};
