#!/usr/bin/env tsx

/**
 * Ratio Kit CLI - Entry Point
 * Built with Gunshi for modern CLI experience
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from './utils/constants';
import { CLIError } from './utils/error-handling';

// Main command definition
const mainCommand = define({
  name: CLI_NAME,
  description: 'Financial statement normalization and ratio analysis',
  run: (ctx) => {
    ctx.log('Use --help to see available commands');
  },
});

// Get command line arguments
const args = process.argv.slice(2);
const subCommand = args[0];

// Command dispatch
async function main(): Promise<void> {
  // Sub-command groups run their own cli() calls for proper nested command support
  if (subCommand === 'analysis' || subCommand === 'analyze') {
    const analysisRunner = (await import('./commands/analysis/index')).default;
    await analysisRunner(args.slice(1));
    return;
  }

  // For top-level commands (--help, --version, unknown commands)
  // Use lazy imports for descriptions in help output
  const { lazy } = await import('gunshi');

  const subCommands = {
    analysis: lazy(async () => mainCommand, {
      name: 'analysis',
      description: 'Financial ratio analysis commands',
    }),
    analyze: lazy(async () => mainCommand, {
      name: 'analyze',
      description: 'Alias for analysis commands',
    }),
  };

  await cli(args, mainCommand, {
    name: CLI_NAME,
    version: CLI_VERSION,
    description: 'Financial statement normalization and ratio analysis',
    subCommands,
  });
}

main().catch((error: unknown) => {
  if (error instanceof CLIError) {
    if (!error.silent) {
      console.error(error.message);
    }
    process.exitCode = error.exitCode;
    return;
  }
  console.error('CLI Error:', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
