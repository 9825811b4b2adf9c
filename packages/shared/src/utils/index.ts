/**
 * Shared utility functions
 */

import { QUANTITY_FAMILIES } from '../constants/index.js';
import type { QuantityFamily } from '../types/index.js';

// ============================================================================
// Numeric Utilities
// ============================================================================

/**
 * Check that a value is a finite number (rejects NaN, ±Infinity and non-numbers)
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Multiply every element of a buffer by a factor, in place
 */
export function scaleInPlace(values: Float64Array, factor: number): Float64Array {
  for (let i = 0; i < values.length; i++) {
    values[i] *= factor;
  }
  return values;
}

// ============================================================================
// Type Guards
// ============================================================================

const FAMILY_NAMES: ReadonlySet<string> = new Set(QUANTITY_FAMILIES);

export function isQuantityFamily(value: unknown): value is QuantityFamily {
  return typeof value === 'string' && FAMILY_NAMES.has(value);
}
