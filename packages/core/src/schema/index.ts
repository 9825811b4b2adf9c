/**
 * Registry configuration and axis snapshot schemas
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import { QUANTITY_FAMILIES } from '@spectral-axis/shared';
import type { ValidationIssue } from '../errors/index.js';

// ============================================================================
// Base Schemas
// ============================================================================

export const QuantityFamilySchema = z.enum(QUANTITY_FAMILIES);

/** Frame label, e.g. "LSR", "heliocentric", "rest" */
export const FrameLabelSchema = z.string().min(1);

/** How many canonical SI units one named unit equals */
export const ScaleFactorSchema = z.number().finite().positive();

/** unitName -> scale factor */
export const UnitTableSchema = z.record(z.string().min(1), ScaleFactorSchema);

// ============================================================================
// Registry Configuration
// ============================================================================

/**
 * Scale tables per family. Redshift is a recognized family but ships without a
 * table, so every family is optional here.
 */
export const FamilyTablesSchema = z
  .object({
    length: UnitTableSchema.optional(),
    frequency: UnitTableSchema.optional(),
    velocity: UnitTableSchema.optional(),
    redshift: UnitTableSchema.optional(),
  })
  .strict();

/** What an axis-type token (VLSR, FREQ, WAVE, ...) implies */
export const AxisTypeEntrySchema = z.object({
  family: QuantityFamilySchema,
  frame: FrameLabelSchema,
});

export const RegistryConfigSchema = z.object({
  families: FamilyTablesSchema,
  axisTypes: z.record(z.string().min(1), AxisTypeEntrySchema).default({}),
});

// ============================================================================
// Axis Snapshot
// ============================================================================

/**
 * Plain, JSON-friendly form of a spectroscopic axis
 */
export const AxisSnapshotSchema = z.object({
  values: z.array(z.number()),
  units: z.string(),
  frame: FrameLabelSchema,
  xtype: QuantityFamilySchema,
  reffreq: z.number().optional(),
  redshift: z.number().optional(),
});

// ============================================================================
// Type Exports
// ============================================================================

export type UnitTable = z.infer<typeof UnitTableSchema>;
export type FamilyTables = z.infer<typeof FamilyTablesSchema>;
export type AxisTypeEntry = z.infer<typeof AxisTypeEntrySchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
/** Registry configuration as accepted before defaults are applied */
export type RegistryConfigInput = z.input<typeof RegistryConfigSchema>;
export type AxisSnapshot = z.infer<typeof AxisSnapshotSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
}

export function formatValidationIssues(issues: ValidationIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
