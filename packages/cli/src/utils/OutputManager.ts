/**
 * Simplified Output manager for CLI commands
 * Status messages go to stderr so JSON and CSV on stdout stay machine-readable
 */

import chalk from 'chalk';

export type OutputMode = 'production' | 'debug';

export class OutputManager {
  private readonly isDebugMode: boolean;

  constructor(mode: OutputMode = 'production') {
    this.isDebugMode = mode === 'debug';
  }

  /**
   * Warning message
   */
  warn(message: string): void {
    console.error(chalk.yellow(`⚠️  ${message}`));
  }

  /**
   * Debug message - shows only in debug mode
   */
  debug(message: string, context?: Record<string, unknown>): void {
    if (this.isDebugMode) {
      if (context) {
        console.error(chalk.blue(`[DEBUG] ${message}`), context);
      } else {
        console.error(chalk.blue(`[DEBUG] ${message}`));
      }
    }
  }

  static createFromOptions(options?: { debug?: boolean }): OutputManager {
    return new OutputManager(options?.debug ? 'debug' : 'production');
  }
}
