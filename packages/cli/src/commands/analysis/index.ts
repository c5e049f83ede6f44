/**
 * Analysis Commands - Entry Point
 * Financial ratio commands with direct imports for full help display
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants';
import { ratiosCommand } from './ratios';

// Analysis group command definition (exported for help display)
export const analysisCommand = define({
  name: 'analysis',
  description: 'Financial ratio analysis commands',
  run: (ctx) => {
    ctx.log('Available commands: ratios');
    ctx.log(`Use "${CLI_NAME} analysis <command> --help" for more information`);
  },
});

// Direct imports for full args display in help
const subCommands = {
  ratios: ratiosCommand,
};

// Export command runner for this group
export default async function analysisCommandRunner(args: string[]): Promise<void> {
  await cli(args, analysisCommand, {
    name: `${CLI_NAME} analysis`,
    version: CLI_VERSION,
    description: 'Financial ratio analysis commands',
    subCommands,
  });
}
