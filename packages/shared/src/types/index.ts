/**
 * Shared type definitions
 */

import type { DOPPLER_CONVENTIONS, QUANTITY_FAMILIES } from '../constants/index.js';

// ============================================================================
// Quantity Types
// ============================================================================

/** A class of physically comparable units */
export type QuantityFamily = (typeof QUANTITY_FAMILIES)[number];

/** Descriptive reference-frame label (LSR, heliocentric, rest, ...) */
export type FrameLabel = string;

/** Alternative formulas relating velocity and frequency shift */
export type DopplerConvention = (typeof DOPPLER_CONVENTIONS)[number];
