/**
 * Ratio Analysis Command
 * Compute ROA, ROE and Current Ratio with period-over-period trends from a statements file
 */

import { define } from 'gunshi';
import { CLI_NAME } from '../../utils/constants';
import { executeRatioAnalysis } from './ratios-helper';

export const ratiosCommand = define({
  name: 'ratios',
  description: 'Compute ROA, ROE and Current Ratio from financial statements',
  args: {
    file: {
      type: 'string',
      short: 'f',
      description: 'Statements JSON file ({ statements: { income, balance, cashflow } } or { records })',
    },
    aliases: {
      type: 'string',
      short: 'a',
      description: 'Alias table JSON file replacing the default label aliases',
    },
    match: {
      type: 'string',
      short: 'm',
      description: 'Alias matching mode (exact|contains, default: RATIO_ALIAS_MATCH or exact)',
    },
    format: {
      type: 'string',
      description: 'Output format (table|json|csv)',
      default: 'table',
    },
    debug: {
      type: 'boolean',
      short: 'd',
      description: 'Enable debug output',
      default: false,
    },
  },
  examples: `
# Ratio table with trends
${CLI_NAME} analysis ratios --file statements.json

# Loosely labelled statements with a custom alias table
${CLI_NAME} analysis ratios -f statements.json --aliases aliases.json --match contains

# Machine-readable output
${CLI_NAME} analysis ratios -f statements.json --format json
${CLI_NAME} analysis ratios -f statements.json --format csv > ratios.csv
  `.trim(),
  run: async (ctx) => {
    const { file, aliases, match, format, debug } = ctx.values;

    await executeRatioAnalysis({ file, aliases, match, format, debug });
  },
});
