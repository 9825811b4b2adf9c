/**
 * Unit tests for Doppler conventions
 */

import { describe, it, expect } from 'vitest';
import { SPEED_OF_LIGHT } from '@spectral-axis/shared';
import {
  assertDopplerConvention,
  frequencyToVelocityMs,
  isDopplerConvention,
  opticalFrequency,
  opticalVelocity,
  radioFrequency,
  radioVelocity,
  relativisticFrequency,
  relativisticVelocity,
  velocityToFrequencyHz,
} from './index.js';
import { UnknownConventionError } from '../errors/index.js';

const HI_LINE_HZ = 1.420405751e9;

describe('radio convention', () => {
  it('leaves the rest frequency at zero velocity', () => {
    expect(radioFrequency(0, HI_LINE_HZ)).toBe(HI_LINE_HZ);
    expect(radioVelocity(HI_LINE_HZ, HI_LINE_HZ)).toBe(0);
  });

  it('shifts linearly with velocity', () => {
    // f = f0 (1 - V/c)
    expect(radioFrequency(1000, 1.42e9)).toBeCloseTo(1.42e9 * (1 - 1000 / SPEED_OF_LIGHT), 3);
  });

  it('gives positive velocity for redshifted frequencies', () => {
    // V = c (f0 - f) / f0 = c / 2
    expect(radioVelocity(0.5e9, 1e9)).toBeCloseTo(SPEED_OF_LIGHT / 2, 3);
  });

  it('inverts its own frequency formula', () => {
    const f = radioFrequency(1000, 1.42e9);
    expect(radioVelocity(f, 1.42e9)).toBeCloseTo(1000, 4);
  });
});

describe('optical convention', () => {
  it('halves the frequency at V = c', () => {
    // f = f0 / (1 + 1)
    expect(opticalFrequency(SPEED_OF_LIGHT, 2e9)).toBe(1e9);
  });

  it('measures velocity relative to the observed frequency', () => {
    // V = c (f0 - f) / f = c (2 - 1) / 1
    expect(opticalVelocity(1e9, 2e9)).toBe(SPEED_OF_LIGHT);
  });

  it('inverts its own frequency formula', () => {
    const f = opticalFrequency(1e6, HI_LINE_HZ);
    expect(opticalVelocity(f, HI_LINE_HZ)).toBeCloseTo(1e6, 2);
  });
});

describe('relativistic convention', () => {
  it('leaves the rest frequency at zero velocity', () => {
    expect(relativisticFrequency(0, HI_LINE_HZ)).toBe(HI_LINE_HZ);
    expect(relativisticVelocity(HI_LINE_HZ, HI_LINE_HZ)).toBe(0);
  });

  it('matches sqrt((1 - β) / (1 + β))', () => {
    const beta = 0.1;
    const expected = HI_LINE_HZ * Math.sqrt((1 - beta) / (1 + beta));
    expect(relativisticFrequency(beta * SPEED_OF_LIGHT, HI_LINE_HZ)).toBeCloseTo(expected, 3);
  });

  it('inverts its own frequency formula', () => {
    const v = 3e7;
    const f = relativisticFrequency(v, HI_LINE_HZ);
    expect(relativisticVelocity(f, HI_LINE_HZ)).toBeCloseTo(v, 2);
  });

  it('stays below c for large shifts', () => {
    expect(relativisticVelocity(1e6, HI_LINE_HZ)).toBeLessThan(SPEED_OF_LIGHT);
  });
});

describe('conventions diverge away from zero velocity', () => {
  it('orders the frequencies for a receding source', () => {
    const v = 1e7;
    const radio = radioFrequency(v, HI_LINE_HZ);
    const optical = opticalFrequency(v, HI_LINE_HZ);
    const relativistic = relativisticFrequency(v, HI_LINE_HZ);
    expect(radio).toBeLessThan(relativistic);
    expect(relativistic).toBeLessThan(optical);
  });
});

describe('dispatch', () => {
  it('routes to the named convention', () => {
    expect(velocityToFrequencyHz(5000, HI_LINE_HZ, 'radio')).toBe(radioFrequency(5000, HI_LINE_HZ));
    expect(velocityToFrequencyHz(5000, HI_LINE_HZ, 'optical')).toBe(
      opticalFrequency(5000, HI_LINE_HZ)
    );
    expect(frequencyToVelocityMs(1.42e9, HI_LINE_HZ, 'relativistic')).toBe(
      relativisticVelocity(1.42e9, HI_LINE_HZ)
    );
  });
});

describe('convention names', () => {
  it('recognizes the three conventions', () => {
    expect(isDopplerConvention('radio')).toBe(true);
    expect(isDopplerConvention('optical')).toBe(true);
    expect(isDopplerConvention('relativistic')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isDopplerConvention('Radio')).toBe(false);
    expect(isDopplerConvention('redshift')).toBe(false);
    expect(() => assertDopplerConvention('warp')).toThrow(UnknownConventionError);
    expect(() => assertDopplerConvention('warp')).toThrow('Convention "warp" is not allowed');
  });

  it('narrows a valid name', () => {
    expect(assertDopplerConvention('optical')).toBe('optical');
  });
});
