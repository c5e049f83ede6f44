/**
 * Alias tables: canonical field → accepted source labels
 *
 * Validated with zod so that tables loaded from JSON files fail early
 * with the offending keys instead of silently resolving nothing.
 */

import { type ZodIssue, z } from 'zod';
import { AliasTableError } from '../errors';
import defaultAliases from './default-aliases.json';
import type { AliasTable } from './types';
import { CANONICAL_FIELDS } from './types';

const LabelListSchema = z
  .array(z.string().trim().min(1, 'Alias labels must not be empty'))
  .min(1, 'At least one alias label is required')
  .readonly();

export const AliasTableSchema = z
  .object({
    totalAssets: LabelListSchema.optional(),
    totalLiabilities: LabelListSchema.optional(),
    netIncome: LabelListSchema.optional(),
    revenue: LabelListSchema.optional(),
    currentAssets: LabelListSchema.optional(),
    currentLiabilities: LabelListSchema.optional(),
    shareholdersEquity: LabelListSchema.optional(),
    inventory: LabelListSchema.optional(),
    operatingCashFlow: LabelListSchema.optional(),
  })
  .strict();

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate an alias table coming from configuration or a file
 *
 * @throws AliasTableError listing every schema issue
 */
export function parseAliasTable(input: unknown): AliasTable {
  const result = AliasTableSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new AliasTableError(`Invalid alias table: ${issues.join(', ')}`, issues);
  }
  return result.data;
}

/**
 * Label variants seen across common statement providers
 */
export const DEFAULT_ALIAS_TABLE: AliasTable = parseAliasTable(defaultAliases);

/**
 * Alias table mapping every canonical field to its own name.
 * Normalizing canonical-shaped records with it is a no-op.
 */
export function identityAliasTable(): AliasTable {
  const table: AliasTable = {};
  for (const field of CANONICAL_FIELDS) {
    table[field] = [field];
  }
  return table;
}
