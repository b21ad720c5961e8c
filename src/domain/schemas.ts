import { z } from 'zod';
import { FLAG_TYPES, type ProviderRecord } from './types.js';

const textField = z.string().default('');

// Spreadsheet imports deliver identifiers, postal codes and phones as numbers.
function numberToString(value: unknown): unknown {
  return typeof value === 'number' ? String(value) : value;
}

const codeField = z.preprocess(numberToString, z.string()).default('');

export const providerRecordInput = z
  .object({
    providerId: z.preprocess(
      numberToString,
      z.string({ required_error: 'Provider id is required' }).trim().min(1, 'Provider id is required'),
    ),
    npi: codeField,
    firstName: textField,
    lastName: textField,
    fullName: textField,
    specialty: textField,
    practiceAddress: textField,
    city: textField,
    state: textField,
    zipCode: codeField,
    phone: codeField,
    email: z.string().nullable().default(null),
    website: z.string().nullable().default(null),
  })
  .transform((data): ProviderRecord => ({
    ...data,
    fullName: data.fullName.trim() || `${data.firstName} ${data.lastName}`.trim(),
  }));

export const createJobInput = z.object({
  filename: z.string().optional(),
  providers: z.array(providerRecordInput).min(1, 'At least one provider is required'),
});

export const flagListQuery = z.object({
  resolved: z.enum(['true', 'false']).optional().transform((v) => (v === undefined ? undefined : v === 'true')),
  providerId: z.string().min(1).optional(),
  flagType: z.enum(FLAG_TYPES).optional(),
});

export const paginationQuery = z.object({
  limit: z.coerce.number().int().positive().max(500).optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
});

export type ProviderRecordInput = z.input<typeof providerRecordInput>;
export type CreateJobInput = z.infer<typeof createJobInput>;
export type FlagListQuery = z.infer<typeof flagListQuery>;
export type PaginationQuery = z.infer<typeof paginationQuery>;
