/**
 * Statements file schema
 * Validates the JSON document read by `analysis ratios --file`
 */

import type { RawStatementRecord, StatementSet } from '@ratio-kit/shared/fundamental-analysis';
import { z } from 'zod';

// JSON has no dates: periods arrive as "2023-12-31", "2023-Q4" or 2023
const PeriodSchema = z.union([z.string().trim().min(1, 'Period must not be empty'), z.number().int().transform(String)]);

const StatementRecordSchema = z.object({
  period: PeriodSchema,
  values: z.record(z.unknown()),
});

const StatementFrameSchema = z.object({
  periods: z.array(PeriodSchema),
  rows: z.record(z.array(z.unknown())),
});

const StatementSourceSchema = z.union([z.array(StatementRecordSchema), StatementFrameSchema]);

const StatementSetSchema = z
  .object({
    income: StatementSourceSchema.optional(),
    balance: StatementSourceSchema.optional(),
    cashflow: StatementSourceSchema.optional(),
  })
  .strict()
  .refine((set) => set.income !== undefined || set.balance !== undefined || set.cashflow !== undefined, {
    message: 'At least one of income, balance or cashflow is required',
  });

export const StatementsFileSchema = z
  .object({
    company: z.string().trim().min(1).optional(),
    statements: StatementSetSchema.optional(),
    records: z.array(StatementRecordSchema).optional(),
  })
  .strict()
  .superRefine((file, ctx) => {
    if ((file.statements === undefined) === (file.records === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Provide exactly one of "statements" or "records"',
      });
    }
  });

export type StatementsFile = z.infer<typeof StatementsFileSchema>;

export interface StatementInput {
  company?: string;
  source: RawStatementRecord[] | StatementSet;
}

/**
 * Validate a parsed statements document
 *
 * @throws ZodError listing every schema issue
 */
export function parseStatementsFile(input: unknown): StatementInput {
  const { company, statements, records } = StatementsFileSchema.parse(input);
  const source = records ?? statements ?? [];
  return company === undefined ? { source } : { company, source };
}
