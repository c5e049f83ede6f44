import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resetConfig } from '@ratio-kit/shared/config';
import { getLogStream, setLogStream } from '@ratio-kit/shared/utils/logger';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { CLIError, CLINotFoundError, CLIValidationError } from '../../utils/error-handling';
import { mockAliasTable, mockRecordsFile, mockStatementsFile } from '../../test-utils/fixtures';
import { executeRatioAnalysis, parseMatchMode, parseOutputFormat } from './ratios-helper';

vi.mock('chalk', () => {
  const identity = (text: string) => text;
  const bold = Object.assign((text: string) => text, { cyan: identity });
  return {
    default: {
      red: identity,
      green: identity,
      yellow: identity,
      white: identity,
      gray: identity,
      blue: identity,
      dim: identity,
      bold,
    },
  };
});

const spinnerFail = vi.hoisted(() => vi.fn());

vi.mock('ora', () => {
  return {
    default: (text?: string) => {
      return {
        text: text ?? '',
        start() {
          return this;
        },
        succeed() {
          return this;
        },
        fail: spinnerFail,
        stop() {
          return this;
        },
      };
    },
  };
});

let workDir = '';

function writeJSON(name: string, content: unknown): string {
  const path = join(workDir, name);
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
  return path;
}

describe('parseOutputFormat', () => {
  it('defaults to table and accepts json and csv', () => {
    expect(parseOutputFormat(undefined)).toBe('table');
    expect(parseOutputFormat('json')).toBe('json');
    expect(parseOutputFormat('csv')).toBe('csv');
  });

  it('rejects unknown formats', () => {
    expect(() => parseOutputFormat('xml')).toThrow('Invalid --format "xml": expected table, json or csv');
  });
});

describe('parseMatchMode', () => {
  it('leaves the mode to configuration when not given', () => {
    expect(parseMatchMode(undefined)).toBeUndefined();
  });

  it('accepts exact and contains in any case', () => {
    expect(parseMatchMode('exact')).toBe('exact');
    expect(parseMatchMode(' Contains ')).toBe('contains');
  });

  it('rejects unknown modes', () => {
    expect(() => parseMatchMode('fuzzy')).toThrow(CLIValidationError);
  });
});

describe('executeRatioAnalysis', () => {
  beforeAll(() => {
    workDir = mkdtempSync(join(tmpdir(), 'ratio-kit-'));
  });

  afterAll(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the ratio CSV for a statements file', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('statements.json', mockStatementsFile);

    const analysis = await executeRatioAnalysis({ file, format: 'csv' });

    expect(analysis.periods.map((period) => period.periodId)).toEqual(['2022-12-31', '2023-12-31']);
    expect(logSpy).toHaveBeenCalledWith('Period,ROA,ROE,Current Ratio\n2022-12-31,0.1,0.2,2\n2023-12-31,0.125,,');
  });

  it('moves library log lines off stdout', async () => {
    setLogStream('stdout');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('stream.json', mockStatementsFile);

    await executeRatioAnalysis({ file, format: 'json' });

    expect(getLogStream()).toBe('stderr');
  });

  it('applies a custom alias table and reports ratios it cannot compute', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('records.json', mockRecordsFile);
    const aliases = writeJSON('aliases.json', mockAliasTable);

    const analysis = await executeRatioAnalysis({ file, aliases, format: 'json' });

    expect(analysis.results.map((result) => result.ratios.ROA)).toEqual([
      { status: 'defined', value: 0.1 },
      { status: 'defined', value: 0.125 },
    ]);

    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({ company: null });

    const warnings = errorSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(warnings).toContain('⚠️  ROE could not be calculated: shareholdersEquity not found in any period');
    expect(warnings).toContain(
      '⚠️  Current Ratio could not be calculated: currentAssets and currentLiabilities not found in any period'
    );
  });

  it('uses contains matching when requested', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('loose.json', {
      records: [{ period: '2023', values: { 'Net Income Attributable To Parent': 6, 'Total Assets': 60 } }],
    });

    const exact = await executeRatioAnalysis({ file, format: 'csv', match: 'exact' });
    const contains = await executeRatioAnalysis({ file, format: 'csv', match: 'contains' });

    expect(exact.results[0]?.ratios.ROA.status).toBe('undefined');
    expect(contains.results[0]?.ratios.ROA).toEqual({ status: 'defined', value: 0.1 });
  });

  it('prints debug details only with --debug', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('debug.json', mockStatementsFile);

    await executeRatioAnalysis({ file, format: 'csv' });
    expect(errorSpy).not.toHaveBeenCalled();

    await executeRatioAnalysis({ file, format: 'csv', debug: true });
    expect(errorSpy.mock.calls.map((call) => String(call[0] ?? ''))).toEqual(['[DEBUG] Loaded statements']);
  });

  it('requires --file', async () => {
    await expect(executeRatioAnalysis({})).rejects.toThrow('--file is required');
  });

  it('reports a missing statements file as not found', async () => {
    const file = join(workDir, 'missing.json');

    await expect(executeRatioAnalysis({ file })).rejects.toBeInstanceOf(CLINotFoundError);
    await expect(executeRatioAnalysis({ file })).rejects.toThrow(`Statements file not found: ${file}`);
  });

  it('rejects files that are not JSON', async () => {
    const file = writeJSON('broken.json', '{ "records": [');

    await expect(executeRatioAnalysis({ file })).rejects.toThrow(`Statements file is not valid JSON: ${file}`);
  });

  it('rejects documents that fail the schema', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('empty.json', { statements: {} });

    await expect(executeRatioAnalysis({ file })).rejects.toThrow(
      'Invalid input: statements: At least one of income, balance or cashflow is required'
    );
  });

  it('reports duplicate periods with their error code', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('duplicates.json', {
      records: [
        { period: '2023-12-31', values: { 'Net Income': 1 } },
        { period: '2023-12-31 00:00:00', values: { 'Net Income': 2 } },
      ],
    });

    await expect(executeRatioAnalysis({ file })).rejects.toThrow(
      '[AMBIGUOUS_PERIOD] Multiple statement records share period "2023-12-31" (records 0, 1)'
    );
  });

  it('shows the failure and troubleshooting tips for duplicate periods', async () => {
    spinnerFail.mockClear();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('duplicates-tips.json', {
      records: [
        { period: '2023', values: { 'Net Income': 1 } },
        { period: '2023', values: { 'Net Income': 2 } },
      ],
    });

    await expect(executeRatioAnalysis({ file })).rejects.toMatchObject({ silent: true });

    expect(spinnerFail).toHaveBeenCalledWith('Ratio analysis failed');
    const lines = errorSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(lines).toContain('\nError: [AMBIGUOUS_PERIOD] Multiple statement records share period "2023" (records 0, 1)');
    expect(lines).toContain('   • Check that every statement record has a unique period');
  });

  it('rejects invalid alias tables', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const file = writeJSON('statements-for-aliases.json', mockStatementsFile);
    const aliases = writeJSON('bad-aliases.json', { grossMargin: ['Gross Margin'] });

    const result = executeRatioAnalysis({ file, aliases });
    await expect(result).rejects.toBeInstanceOf(CLIError);
    await expect(result).rejects.toThrow('[INVALID_ALIAS_TABLE] Invalid alias table:');
  });
});
