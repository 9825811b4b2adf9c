import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleDiagnostics } from './index.js';

describe('consoleDiagnostics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes info events through console.info', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    consoleDiagnostics({
      level: 'info',
      code: 'already-in-units',
      message: 'Already in desired units and frame',
      units: 'nm',
      frame: 'rest',
    });
    expect(info).toHaveBeenCalledWith(
      '[spectral-axis] already-in-units: Already in desired units and frame'
    );
  });

  it('writes warnings through console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleDiagnostics({
      level: 'warn',
      code: 'axis-type-ignored',
      message: 'Unrecognized axis type VBARY; inferred frequency from "GHz"',
      axisType: 'VBARY',
      inferredFamily: 'frequency',
    });
    expect(warn).toHaveBeenCalledWith(
      '[spectral-axis] axis-type-ignored: Unrecognized axis type VBARY; inferred frequency from "GHz"'
    );
  });
});
