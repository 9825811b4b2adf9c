/**
 * Error taxonomy for unit lookup and axis conversion failures.
 * Every error is thrown synchronously at the offending call, before any mutation.
 */

import type { FrameLabel, QuantityFamily } from '@spectral-axis/shared';

export type SpectralAxisErrorCode =
  | 'UNKNOWN_UNIT'
  | 'UNKNOWN_AXIS_TYPE'
  | 'INCOMPATIBLE_FAMILY'
  | 'MISSING_PARAMETER'
  | 'INVALID_PARAMETER'
  | 'INVALID_UNIT'
  | 'UNKNOWN_CONVENTION'
  | 'FRAME_CONVERSION_UNSUPPORTED'
  | 'REGISTRY_CONFIG'
  | 'INVALID_SNAPSHOT';

/** A single validation problem reported by a schema */
export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

export class SpectralAxisError extends Error {
  readonly code: SpectralAxisErrorCode;

  constructor(code: SpectralAxisErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'SpectralAxisError';
  }
}

/** Unit string not registered under the relevant family */
export class UnknownUnitError extends SpectralAxisError {
  readonly unit: string;
  readonly family?: QuantityFamily;

  constructor(unit: string, family?: QuantityFamily) {
    super(
      'UNKNOWN_UNIT',
      family ? `Unknown ${family} unit: "${unit}"` : `Unknown unit: "${unit}"`
    );
    this.unit = unit;
    this.family = family;
    this.name = 'UnknownUnitError';
  }
}

export class UnknownAxisTypeError extends SpectralAxisError {
  readonly axisType: string;

  constructor(axisType: string) {
    super('UNKNOWN_AXIS_TYPE', `Unknown axis type: "${axisType}"`);
    this.axisType = axisType;
    this.name = 'UnknownAxisTypeError';
  }
}

/**
 * A unit (or the axis itself) belongs to a different family than the operation needs,
 * e.g. converting a length axis to "km/s"
 */
export class IncompatibleFamilyError extends SpectralAxisError {
  readonly unit: string;
  readonly expected: QuantityFamily;
  readonly actual: QuantityFamily;

  constructor(unit: string, expected: QuantityFamily, actual: QuantityFamily) {
    super('INCOMPATIBLE_FAMILY', `Expected ${expected}, got "${unit}" (${actual})`);
    this.unit = unit;
    this.expected = expected;
    this.actual = actual;
    this.name = 'IncompatibleFamilyError';
  }
}

export class MissingParameterError extends SpectralAxisError {
  readonly parameter: string;

  constructor(parameter: string, message?: string) {
    super('MISSING_PARAMETER', message ?? `Missing required parameter: ${parameter}`);
    this.parameter = parameter;
    this.name = 'MissingParameterError';
  }
}

export class InvalidParameterError extends SpectralAxisError {
  readonly parameter: string;
  readonly value: unknown;

  constructor(parameter: string, value: unknown, expectation: string) {
    super('INVALID_PARAMETER', `Invalid ${parameter}: ${String(value)} (${expectation})`);
    this.parameter = parameter;
    this.value = value;
    this.name = 'InvalidParameterError';
  }
}

/** A unit-name argument is not registered for the role it is passed in */
export class InvalidUnitError extends SpectralAxisError {
  readonly unit: string;
  readonly family: QuantityFamily;

  constructor(unit: string, family: QuantityFamily) {
    super('INVALID_UNIT', `Bad ${family} units: "${unit}"`);
    this.unit = unit;
    this.family = family;
    this.name = 'InvalidUnitError';
  }
}

export class UnknownConventionError extends SpectralAxisError {
  readonly convention: string;

  constructor(convention: string) {
    super('UNKNOWN_CONVENTION', `Convention "${convention}" is not allowed`);
    this.convention = convention;
    this.name = 'UnknownConventionError';
  }
}

export class FrameConversionUnsupportedError extends SpectralAxisError {
  readonly fromFrame: FrameLabel;
  readonly toFrame: FrameLabel;

  constructor(fromFrame: FrameLabel, toFrame: FrameLabel) {
    super(
      'FRAME_CONVERSION_UNSUPPORTED',
      `Converting frames from ${fromFrame} to ${toFrame} is not implemented`
    );
    this.fromFrame = fromFrame;
    this.toFrame = toFrame;
    this.name = 'FrameConversionUnsupportedError';
  }
}

export class RegistryConfigError extends SpectralAxisError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('REGISTRY_CONFIG', message);
    this.issues = issues;
    this.name = 'RegistryConfigError';
  }
}

export class InvalidSnapshotError extends SpectralAxisError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('INVALID_SNAPSHOT', message);
    this.issues = issues;
    this.name = 'InvalidSnapshotError';
  }
}

export function isSpectralAxisError(value: unknown): value is SpectralAxisError {
  return value instanceof SpectralAxisError;
}
