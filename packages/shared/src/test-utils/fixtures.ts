import type {
  CanonicalField,
  CanonicalPeriod,
  FieldValue,
  RawStatementRecord,
  StatementFrame,
} from '../fundamental-analysis/types';
import { createEmptyFields, isCanonicalField } from '../fundamental-analysis/utils';

/**
 * Build a canonical period; fields not listed are absent
 */
export function createPeriod(
  periodId: string,
  values: Partial<Record<CanonicalField, number | FieldValue>> = {}
): CanonicalPeriod {
  const fields = createEmptyFields();
  for (const [name, value] of Object.entries(values)) {
    if (!isCanonicalField(name) || value === undefined) continue;
    fields[name] = typeof value === 'number' ? { status: 'present', value } : value;
  }
  return { periodId, fields };
}

// Two fiscal years where the later one has zero equity and zero current liabilities
export const zeroDenominatorPeriods: CanonicalPeriod[] = [
  createPeriod('2022-12-31', {
    totalAssets: 100,
    netIncome: 10,
    shareholdersEquity: 50,
    currentAssets: 40,
    currentLiabilities: 20,
  }),
  createPeriod('2023-12-31', {
    totalAssets: 120,
    netIncome: 15,
    shareholdersEquity: 0,
    currentAssets: 50,
    currentLiabilities: 0,
  }),
];

// Income statement as a provider frame, newest period first
export const mockIncomeFrame: StatementFrame = {
  periods: ['2023-12-31 00:00:00', '2022-12-31 00:00:00', '2021-12-31 00:00:00'],
  rows: {
    'Total Revenue': [5000, 4200, 3900],
    'Net Income': [600, 420, -80],
    'Operating Income': [800, 610, 40],
  },
};

// Balance sheet as a provider frame, newest period first
export const mockBalanceFrame: StatementFrame = {
  periods: ['2023-12-31 00:00:00', '2022-12-31 00:00:00', '2021-12-31 00:00:00'],
  rows: {
    'Total Assets': [8000, 7000, 6400],
    'Total Liabilities Net Minority Interest': [5000, 4500, 4400],
    'Stockholders Equity': [3000, 2500, 2000],
    'Current Assets': [2400, 2100, 1800],
    'Current Liabilities': [1200, 1400, 'N/A'],
    Inventory: [300, 280, 260],
  },
};

export const mockMergedRecords: RawStatementRecord[] = [
  {
    period: '2023',
    values: { 'Net Income': 15, 'Total Assets': 120, 'Total Equity': 60, 'Current Assets': 30, 'Current Liabilities': 20 },
  },
  {
    period: '2022',
    values: { 'Net Income': 10, 'Total Assets': 100, 'Total Equity': 50, 'Current Assets': 25, 'Current Liabilities': 25 },
  },
];
