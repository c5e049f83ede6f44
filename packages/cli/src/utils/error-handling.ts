/**
 * Error Handling Utilities
 * Common error handling patterns for CLI commands
 */

import { isRatioKitError } from '@ratio-kit/shared/errors';
import chalk from 'chalk';
import type { Ora } from 'ora';
import { ZodError } from 'zod';

/**
 * Base error class for CLI operations
 * Provides structured error handling with exit codes
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly silent: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CLIError';
  }
}

/**
 * Error thrown when input validation fails
 */
export class CLIValidationError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1, false, options);
    this.name = 'CLIValidationError';
  }
}

/**
 * Error thrown when a required resource is not found
 */
export class CLINotFoundError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1, false, options);
    this.name = 'CLINotFoundError';
  }
}

/**
 * Default troubleshooting tips
 */
const DEFAULT_TROUBLESHOOTING_TIPS = ['Try with --debug flag for more information'];

/**
 * Ratio analysis troubleshooting tips
 */
export const RATIO_TIPS = [
  'Check that every statement record has a unique period',
  'Pass --aliases with a custom alias table when line items use unusual labels',
  'Try --match contains for loosely labelled statements',
  'Try with --debug flag for more information',
];

/**
 * Display troubleshooting tips
 */
export function displayTroubleshootingTips(tips: string[]): void {
  console.error(chalk.gray('\n💡 Troubleshooting tips:'));
  for (const tip of tips) {
    console.error(chalk.gray(`   • ${tip}`));
  }
}

/**
 * Format zod issues as "path: message" lines joined by "; "
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Map library errors onto CLI errors.
 * Caller mistakes become CLIValidationError; other library errors keep their code in the message.
 */
export function toCLIError(error: unknown): unknown {
  if (error instanceof CLIError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new CLIValidationError(`Invalid input: ${formatZodIssues(error)}`, { cause: error });
  }
  if (isRatioKitError(error)) {
    const message = `[${error.code}] ${error.message}`;
    return error.httpStatus < 500
      ? new CLIValidationError(message, { cause: error })
      : new CLIError(message, 1, false, { cause: error });
  }
  return error;
}

/**
 * Handle command error with consistent formatting.
 * Library and zod errors are reported with their mapped message and the tips.
 */
export function handleCommandError(
  error: unknown,
  spinner: Pick<Ora, 'fail' | 'stop'>,
  options: {
    failMessage: string;
    debug?: boolean;
    tips?: string[];
  }
): never {
  // Re-throw CLIError directly to preserve original exitCode/silent flags
  if (error instanceof CLIError) {
    spinner.stop();
    throw error;
  }

  spinner.fail(options.failMessage);

  const mapped = toCLIError(error);
  const errorMessage = mapped instanceof Error ? mapped.message : String(mapped);
  console.error(chalk.red(`\nError: ${errorMessage}`));

  if (options.debug && error instanceof Error && error.stack) {
    console.error(chalk.gray(`\n[DEBUG] Stack trace:\n${error.stack}`));
  }

  displayTroubleshootingTips(options.tips ?? DEFAULT_TROUBLESHOOTING_TIPS);

  throw new CLIError(errorMessage, 1, true, { cause: error });
}
