import {
  pgTable,
  uuid,
  text,
  boolean,
  timestamp,
  jsonb,
  integer,
  doublePrecision,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type {
  FlagField,
  FlagSeverity,
  FlagType,
  JobStatus,
  SourceValidations,
  ValidationStatus,
} from '../../domain/types.js';

export const providers = pgTable(
  'providers',
  {
    providerId: text('provider_id').primaryKey(),
    npi: text('npi').notNull().default(''),
    firstName: text('first_name').notNull().default(''),
    lastName: text('last_name').notNull().default(''),
    fullName: text('full_name').notNull().default(''),
    specialty: text('specialty').notNull().default(''),
    practiceAddress: text('practice_address').notNull().default(''),
    city: text('city').notNull().default(''),
    state: text('state').notNull().default(''),
    zipCode: text('zip_code').notNull().default(''),
    phone: text('phone').notNull().default(''),
    email: text('email'),
    website: text('website'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_providers_npi').on(table.npi)],
);

export const processingJobs = pgTable(
  'processing_jobs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    filename: text('filename'),
    totalProviders: integer('total_providers').notNull(),
    status: text('status').$type<JobStatus>().notNull().default('PENDING'),
    processedCount: integer('processed_count').notNull().default(0),
    successCount: integer('success_count').notNull().default(0),
    errorCount: integer('error_count').notNull().default(0),
    startedAt: timestamp('started_at', { withTimezone: true }),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    errorMessage: text('error_message'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_processing_jobs_status').on(table.status),
    check(
      'processing_jobs_status_check',
      sql`status IN ('PENDING', 'PROCESSING', 'COMPLETED', 'FAILED', 'CANCELLED')`,
    ),
  ],
);

export const validationResults = pgTable(
  'validation_results',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    providerId: text('provider_id').notNull(),
    jobId: uuid('job_id').references(() => processingJobs.id),
    validatedAt: timestamp('validated_at', { withTimezone: true }).notNull(),
    durationSeconds: doublePrecision('duration_seconds').notNull(),
    overallConfidence: doublePrecision('overall_confidence').notNull(),
    status: text('status').$type<ValidationStatus>().notNull(),
    validations: jsonb('validations').$type<SourceValidations>().notNull(),
    anomalies: jsonb('anomalies').$type<string[]>().notNull().default([]),
    recommendations: jsonb('recommendations').$type<string[]>().notNull().default([]),
    sourcesUsed: text('sources_used').array().notNull(),
    errorMessage: text('error_message'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_validation_results_provider').on(table.providerId, table.validatedAt),
    index('idx_validation_results_job').on(table.jobId),
    check(
      'validation_results_status_check',
      sql`status IN ('PENDING', 'VALIDATED', 'PARTIAL', 'FLAGGED', 'ERROR')`,
    ),
  ],
);

export const flags = pgTable(
  'flags',
  {
    id: uuid('id').primaryKey(),
    providerId: text('provider_id').notNull(),
    validationResultId: uuid('validation_result_id').references(() => validationResults.id),
    position: integer('position').notNull().default(0),
    flagType: text('flag_type').$type<FlagType>().notNull(),
    severity: text('severity').$type<FlagSeverity>().notNull(),
    field: text('field').$type<FlagField>().notNull(),
    message: text('message').notNull(),
    details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
    resolved: boolean('resolved').notNull().default(false),
    resolvedAt: timestamp('resolved_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_flags_provider').on(table.providerId),
    index('idx_flags_result').on(table.validationResultId),
    index('idx_flags_unresolved').on(table.flagType).where(sql`resolved = false`),
    check('flags_type_check', sql`flag_type IN ('CRITICAL', 'WARNING', 'INFO')`),
  ],
);
