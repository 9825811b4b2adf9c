/**
 * Doppler conventions relating a line-of-sight velocity to an observed frequency.
 *
 * Conventions (f0 = rest/center frequency, V = velocity, c = speed of light):
 *
 * | Convention   | V(f)                       | f(V)                          |
 * |--------------|----------------------------|-------------------------------|
 * | radio        | c (f0 - f) / f0            | f0 (1 - V/c)                  |
 * | optical      | c (f0 - f) / f             | f0 / (1 + V/c)                |
 * | relativistic | c (f0² - f²) / (f0² + f²)  | f0 sqrt(1 - (V/c)²) / (1+V/c) |
 *
 * All functions work in SI units (Hz, m/s). Positive velocities are recession.
 */

import { DOPPLER_CONVENTIONS, SPEED_OF_LIGHT } from '@spectral-axis/shared';
import type { DopplerConvention } from '@spectral-axis/shared';
import { UnknownConventionError } from '../errors/index.js';

const CONVENTION_NAMES: ReadonlySet<string> = new Set(DOPPLER_CONVENTIONS);

export function isDopplerConvention(value: unknown): value is DopplerConvention {
  return typeof value === 'string' && CONVENTION_NAMES.has(value);
}

/**
 * Narrow a convention name, failing on anything unrecognized
 * @throws UnknownConventionError
 */
export function assertDopplerConvention(value: string): DopplerConvention {
  if (!isDopplerConvention(value)) {
    throw new UnknownConventionError(value);
  }
  return value;
}

// ============================================================================
// Velocity -> Frequency
// ============================================================================

export function radioFrequency(velocityMs: number, restFrequencyHz: number): number {
  return restFrequencyHz * (1 - velocityMs / SPEED_OF_LIGHT);
}

export function opticalFrequency(velocityMs: number, restFrequencyHz: number): number {
  return restFrequencyHz / (1 + velocityMs / SPEED_OF_LIGHT);
}

export function relativisticFrequency(velocityMs: number, restFrequencyHz: number): number {
  const beta = velocityMs / SPEED_OF_LIGHT;
  return (restFrequencyHz * Math.sqrt(1 - beta * beta)) / (1 + beta);
}

// ============================================================================
// Frequency -> Velocity
// ============================================================================

export function radioVelocity(frequencyHz: number, restFrequencyHz: number): number {
  return (SPEED_OF_LIGHT * (restFrequencyHz - frequencyHz)) / restFrequencyHz;
}

export function opticalVelocity(frequencyHz: number, restFrequencyHz: number): number {
  return (SPEED_OF_LIGHT * (restFrequencyHz - frequencyHz)) / frequencyHz;
}

export function relativisticVelocity(frequencyHz: number, restFrequencyHz: number): number {
  const f0sq = restFrequencyHz * restFrequencyHz;
  const fsq = frequencyHz * frequencyHz;
  return (SPEED_OF_LIGHT * (f0sq - fsq)) / (f0sq + fsq);
}

// ============================================================================
// Dispatch
// ============================================================================

type DopplerFn = (value: number, restFrequencyHz: number) => number;

const TO_FREQUENCY: Record<DopplerConvention, DopplerFn> = {
  radio: radioFrequency,
  optical: opticalFrequency,
  relativistic: relativisticFrequency,
};

const TO_VELOCITY: Record<DopplerConvention, DopplerFn> = {
  radio: radioVelocity,
  optical: opticalVelocity,
  relativistic: relativisticVelocity,
};

/**
 * Observed frequency (Hz) for a velocity (m/s)
 */
export function velocityToFrequencyHz(
  velocityMs: number,
  restFrequencyHz: number,
  convention: DopplerConvention
): number {
  return TO_FREQUENCY[convention](velocityMs, restFrequencyHz);
}

/**
 * Velocity (m/s) for an observed frequency (Hz)
 */
export function frequencyToVelocityMs(
  frequencyHz: number,
  restFrequencyHz: number,
  convention: DopplerConvention
): number {
  return TO_VELOCITY[convention](frequencyHz, restFrequencyHz);
}
