// Two fiscal years where the later one reports zero equity and zero current liabilities
export const mockStatementsFile = {
  company: 'Example Manufacturing',
  statements: {
    income: {
      periods: ['2023-12-31', '2022-12-31'],
      rows: {
        'Total Revenue': [200, 180],
        'Net Income': [15, 10],
      },
    },
    balance: {
      periods: ['2023-12-31', '2022-12-31'],
      rows: {
        'Total Assets': [120, 100],
        'Total Stockholder Equity': [0, 50],
        'Total Current Assets': [50, 40],
        'Total Current Liabilities': [0, 20],
      },
    },
  },
};

export const mockRecordsFile = {
  records: [
    { period: 2023, values: { Profit: 12, Assets: 96 } },
    { period: 2022, values: { Profit: 9, Assets: 90 } },
  ],
};

export const mockAliasTable = {
  netIncome: ['Profit'],
  totalAssets: ['Assets'],
};
