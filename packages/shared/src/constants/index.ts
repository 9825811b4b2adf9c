/**
 * Physical and application constants
 */

// ============================================================================
// Physical Constants
// ============================================================================

/** Speed of light in vacuum (m/s), exact by SI definition */
export const SPEED_OF_LIGHT = 2.99792458e8;

// ============================================================================
// Quantity Families
// ============================================================================

/** Families that carry a scale table and can be converted */
export const CONVERTIBLE_FAMILIES = ['length', 'frequency', 'velocity'] as const;

/** Every quantity family an axis may be typed as */
export const QUANTITY_FAMILIES = [...CONVERTIBLE_FAMILIES, 'redshift'] as const;

/** Canonical SI unit that each convertible family's scale factors are relative to */
export const CANONICAL_UNITS = {
  length: 'm',
  frequency: 'Hz',
  velocity: 'm/s',
} as const;

// ============================================================================
// Doppler Conventions
// ============================================================================

/** Supported velocity/frequency Doppler conventions */
export const DOPPLER_CONVENTIONS = ['radio', 'optical', 'relativistic'] as const;

// ============================================================================
// Axis Defaults
// ============================================================================

/** Frame assigned when none is given */
export const DEFAULT_FRAME = 'rest';

/** Default unit for center frequencies and frequency output */
export const DEFAULT_FREQUENCY_UNIT = CANONICAL_UNITS.frequency;

/** Default unit for velocity output */
export const DEFAULT_VELOCITY_UNIT = CANONICAL_UNITS.velocity;

/** Default Doppler convention */
export const DEFAULT_DOPPLER_CONVENTION = 'radio';
