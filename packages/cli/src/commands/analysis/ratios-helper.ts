/**
 * Ratio Analysis Helper Functions
 * Loads a statements file, runs the analysis and prints the results
 */

import { readFile } from 'node:fs/promises';
import { getConfig } from '@ratio-kit/shared/config';
import {
  type AliasMatchMode,
  type AliasTable,
  analyzeStatements,
  DEFAULT_ALIAS_TABLE,
  type FinancialAnalysis,
  parseAliasTable,
} from '@ratio-kit/shared/fundamental-analysis';
import { setLogStream } from '@ratio-kit/shared/utils/logger';
import ora from 'ora';
import { z } from 'zod';
import { CLINotFoundError, CLIValidationError, handleCommandError, RATIO_TIPS } from '../../utils/error-handling';
import { OutputManager } from '../../utils/OutputManager';
import { parseStatementsFile, type StatementInput } from './input-schema';
import { outputCSV, outputJSON, outputTable } from './ratios-output';

export type OutputFormat = 'table' | 'json' | 'csv';

export interface RatioAnalysisOptions {
  file?: string;
  aliases?: string;
  match?: string;
  format?: string;
  debug?: boolean;
}

const OutputFormatSchema = z.enum(['table', 'json', 'csv']);
const MatchModeSchema = z.enum(['exact', 'contains']);

export function parseOutputFormat(value: string | undefined): OutputFormat {
  const result = OutputFormatSchema.safeParse(value ?? 'table');
  if (!result.success) {
    throw new CLIValidationError(`Invalid --format "${value}": expected table, json or csv`);
  }
  return result.data;
}

/**
 * Parse --match; undefined defers to RATIO_ALIAS_MATCH
 */
export function parseMatchMode(value: string | undefined): AliasMatchMode | undefined {
  if (value === undefined) {
    return undefined;
  }
  const result = MatchModeSchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new CLIValidationError(`Invalid --match "${value}": expected exact or contains`);
  }
  return result.data;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse a JSON file
 *
 * @throws CLINotFoundError when the file does not exist
 * @throws CLIValidationError when the file is not valid JSON
 */
export async function readJSONFile(path: string, description: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new CLINotFoundError(`${description} not found: ${path}`, { cause: error });
    }
    throw error;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new CLIValidationError(`${description} is not valid JSON: ${path}`, { cause: error });
  }
}

export async function loadStatementInput(path: string): Promise<StatementInput> {
  return parseStatementsFile(await readJSONFile(path, 'Statements file'));
}

export async function loadAliasTable(path: string): Promise<AliasTable> {
  return parseAliasTable(await readJSONFile(path, 'Alias table'));
}

/**
 * Main ratio analysis execution function
 */
export async function executeRatioAnalysis(options: RatioAnalysisOptions): Promise<FinancialAnalysis> {
  const output = OutputManager.createFromOptions(options);
  setLogStream('stderr');

  if (!options.file) {
    throw new CLIValidationError('--file is required');
  }
  const format = parseOutputFormat(options.format);
  const matchMode = parseMatchMode(options.match);

  const spinner = ora('Loading statements...').start();

  try {
    const input = await loadStatementInput(options.file);
    const aliasTable = options.aliases ? await loadAliasTable(options.aliases) : DEFAULT_ALIAS_TABLE;
    output.debug('Loaded statements', {
      file: options.file,
      company: input.company,
      aliases: options.aliases ?? 'default',
      matchMode: matchMode ?? getConfig().normalizer.matchMode,
    });

    spinner.text = 'Computing ratios...';
    const analysis = analyzeStatements(input.source, matchMode ? { aliasTable, matchMode } : { aliasTable });
    spinner.succeed(`Computed ratios for ${analysis.periods.length} periods`);

    outputResults(analysis, format, input.company);
    reportDiagnostics(analysis, output);
    return analysis;
  } catch (error) {
    handleCommandError(error, spinner, {
      failMessage: 'Ratio analysis failed',
      debug: options.debug,
      tips: RATIO_TIPS,
    });
  }
}

/**
 * Warn about ratios that could not be computed and non-numeric source values
 */
function reportDiagnostics(analysis: FinancialAnalysis, output: OutputManager): void {
  if (analysis.periods.length === 0) {
    output.warn('No statement periods found in the input');
    return;
  }
  for (const diagnostic of analysis.diagnostics) {
    output.warn(diagnostic.message);
  }
}

/**
 * Output results in specified format
 */
function outputResults(analysis: FinancialAnalysis, format: OutputFormat, company?: string): void {
  switch (format) {
    case 'json':
      outputJSON(analysis, company);
      break;
    case 'csv':
      outputCSV(analysis);
      break;
    default:
      outputTable(analysis, getConfig().display, company);
      break;
  }
}
