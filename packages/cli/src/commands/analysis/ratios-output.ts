/**
 * Ratio Output Functions
 * Table, JSON and CSV output formatting for ratio analysis
 */

import type { DisplayConfig } from '@ratio-kit/shared/config';
import {
  type FinancialAnalysis,
  formatRatioValue,
  formatTrend,
  RATIO_NAMES,
  type RatioValue,
  type TrendAnnotation,
  toRatioCsv,
  toRatioRows,
} from '@ratio-kit/shared/fundamental-analysis';
import chalk from 'chalk';

const PERIOD_WIDTH = 14;
const VALUE_WIDTH = 16;
const RULE_WIDTH = PERIOD_WIDTH + VALUE_WIDTH * RATIO_NAMES.length;

/**
 * Build the ratio table: one row per period, one column per ratio
 */
export function buildRatioTable(analysis: FinancialAnalysis, display: DisplayConfig, company?: string): string[] {
  const title = company ? `Financial Ratios: ${company}` : 'Financial Ratios';
  const lines = [chalk.bold(title), '═'.repeat(RULE_WIDTH)];

  lines.push(
    chalk.bold.cyan('Period'.padEnd(PERIOD_WIDTH)) +
      RATIO_NAMES.map((name) => chalk.bold.cyan(name.padEnd(VALUE_WIDTH))).join('')
  );
  lines.push('─'.repeat(RULE_WIDTH));

  for (const result of analysis.results) {
    const cells = RATIO_NAMES.map((name) => {
      const value = result.ratios[name];
      return colorValue(value)(formatRatioValue(name, value, display).padEnd(VALUE_WIDTH));
    });
    lines.push(result.periodId.padEnd(PERIOD_WIDTH) + cells.join(''));
  }

  lines.push('─'.repeat(RULE_WIDTH));
  return lines;
}

/**
 * Build the trend section: one line per adjacent period pair and ratio
 */
export function buildTrendLines(analysis: FinancialAnalysis, display: DisplayConfig): string[] {
  const transitions = analysis.trends.ROA;
  if (transitions.length === 0) {
    return [];
  }

  const lines = [chalk.bold('Trends:')];
  for (const [index, transition] of transitions.entries()) {
    lines.push(`${transition.fromPeriodId} → ${transition.toPeriodId}`);
    for (const name of RATIO_NAMES) {
      const annotation = analysis.trends[name][index];
      if (!annotation) continue;
      const text = formatTrend(annotation, display);
      lines.push(`  ${name.padEnd(VALUE_WIDTH)}${colorTrend(annotation)(text)}`);
    }
  }
  return lines;
}

/**
 * Output results in table format
 */
export function outputTable(analysis: FinancialAnalysis, display: DisplayConfig, company?: string): void {
  console.log();
  for (const line of buildRatioTable(analysis, display, company)) {
    console.log(line);
  }

  const trendLines = buildTrendLines(analysis, display);
  if (trendLines.length > 0) {
    console.log();
    for (const line of trendLines) {
      console.log(line);
    }
  }

  console.log();
  renderLegend();
}

/**
 * Output the full analysis as JSON
 */
export function outputJSON(analysis: FinancialAnalysis, company?: string): void {
  console.log(
    JSON.stringify(
      {
        company: company ?? null,
        ratios: toRatioRows(analysis),
        results: analysis.results,
        trends: analysis.trends,
        diagnostics: analysis.diagnostics,
      },
      null,
      2
    )
  );
}

/**
 * Output results in CSV format
 */
export function outputCSV(analysis: FinancialAnalysis): void {
  console.log(toRatioCsv(analysis));
}

/**
 * Render legend
 */
function renderLegend(): void {
  console.log(chalk.dim('Legend:'));
  console.log(chalk.dim('  ROA = Net Income / Total Assets, ROE = Net Income / Shareholders Equity'));
  console.log(chalk.dim('  Current Ratio = Current Assets / Current Liabilities'));
  console.log(chalk.dim('  — = not computable (missing input or zero denominator)'));
  console.log(chalk.dim('  pp = percentage points'));
}

function colorValue(value: RatioValue): (text: string) => string {
  if (value.status === 'undefined') return chalk.dim;
  if (value.value < 0) return chalk.red;
  return chalk.white;
}

function colorTrend(annotation: TrendAnnotation): (text: string) => string {
  if (annotation.delta === null) return chalk.dim;
  if (annotation.delta > 0) return chalk.green;
  if (annotation.delta < 0) return chalk.red;
  return chalk.white;
}
