/**
 * Structured diagnostic events emitted by axis operations that succeed
 * but deserve a notice (no-op conversions, ignored or overriding axis types).
 */

import type { FrameLabel, QuantityFamily } from '@spectral-axis/shared';

export type DiagnosticLevel = 'info' | 'warn';

export type AxisDiagnostic =
  | {
      level: 'info';
      code: 'already-in-units';
      message: string;
      units: string;
      frame: FrameLabel;
    }
  | {
      level: 'warn';
      code: 'axis-type-ignored';
      message: string;
      axisType: string;
      inferredFamily: QuantityFamily;
    }
  | {
      level: 'info';
      code: 'frame-overridden';
      message: string;
      axisType: string;
      requestedFrame: FrameLabel;
      frame: FrameLabel;
    };

export type AxisDiagnosticCode = AxisDiagnostic['code'];

export type DiagnosticListener = (event: AxisDiagnostic) => void;

/**
 * Listener that writes events to the console
 */
export const consoleDiagnostics: DiagnosticListener = (event) => {
  if (event.level === 'warn') {
    console.warn(`[spectral-axis] ${event.code}: ${event.message}`);
  } else {
    console.info(`[spectral-axis] ${event.code}: ${event.message}`);
  }
};
