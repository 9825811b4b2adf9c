/**
 * Spectroscopic axis: the independent coordinate of a spectrum (wavelength,
 * frequency, velocity, or redshift) with its units, frame, and quantity family.
 *
 * Conversions mutate the axis in place. Inputs are validated before anything
 * is touched, so a failed call leaves values and metadata as they were.
 */

import {
  DEFAULT_DOPPLER_CONVENTION,
  DEFAULT_FRAME,
  DEFAULT_FREQUENCY_UNIT,
  DEFAULT_VELOCITY_UNIT,
  isFiniteNumber,
  scaleInPlace,
} from '@spectral-axis/shared';
import type { FrameLabel, QuantityFamily } from '@spectral-axis/shared';
import type { AxisDiagnostic, DiagnosticListener } from '../diagnostics/index.js';
import {
  assertDopplerConvention,
  frequencyToVelocityMs,
  velocityToFrequencyHz,
} from '../doppler/index.js';
import {
  FrameConversionUnsupportedError,
  IncompatibleFamilyError,
  InvalidParameterError,
  InvalidSnapshotError,
  InvalidUnitError,
  MissingParameterError,
  UnknownUnitError,
} from '../errors/index.js';
import {
  AxisSnapshotSchema,
  formatValidationIssues,
  toValidationIssues,
} from '../schema/index.js';
import type { AxisSnapshot } from '../schema/index.js';
import { defaultUnitRegistry } from '../units/index.js';
import type { UnitRegistry } from '../units/index.js';

// ============================================================================
// Types
// ============================================================================

/** Dependencies an axis is wired to */
export interface AxisContext {
  /** Lookup tables; defaults to the bundled registry */
  registry?: UnitRegistry;
  /** Receives notices for calls that succeed without doing anything surprising */
  onDiagnostic?: DiagnosticListener;
}

export interface AxisOptions extends AxisContext {
  /** Reference frame label (default "rest"); replaced by the frame a recognized xtype implies */
  frame?: FrameLabel;
  /** Axis-type token such as "VLSR", "FREQ" or "WAVE" */
  xtype?: string;
  /** Reference frequency, carried for downstream use */
  reffreq?: number;
  /** Redshift, carried for downstream use */
  redshift?: number;
}

export interface VelocityToFrequencyOptions {
  /** Units of both the center frequency and the resulting axis (default "Hz") */
  frequencyUnits?: string;
  /** radio | optical | relativistic (default "radio") */
  convention?: string;
}

export interface FrequencyToVelocityOptions {
  /** Units the center frequency is given in (default "Hz") */
  centerFrequencyUnits?: string;
  /** Units of the resulting axis (default "m/s") */
  velocityUnits?: string;
  /** radio | optical | relativistic (default "radio") */
  convention?: string;
}

/** Outcome of {@link SpectroscopicAxis.convertTo} */
export type ConvertStatus = 'converted' | 'unchanged';

interface AxisState {
  values: Float64Array;
  units: string;
  frame: FrameLabel;
  xtype: QuantityFamily;
  reffreq?: number;
  redshift?: number;
}

// ============================================================================
// Spectroscopic Axis
// ============================================================================

export class SpectroscopicAxis implements Iterable<number> {
  private buffer: Float64Array;
  private currentUnits: string;
  private currentFrame: FrameLabel;
  private currentXtype: QuantityFamily;
  private readonly registry: UnitRegistry;
  private readonly onDiagnostic?: DiagnosticListener;

  reffreq?: number;
  redshift?: number;

  private constructor(state: AxisState, context: AxisContext) {
    this.buffer = state.values;
    this.currentUnits = state.units;
    this.currentFrame = state.frame;
    this.currentXtype = state.xtype;
    this.reffreq = state.reffreq;
    this.redshift = state.redshift;
    this.registry = context.registry ?? defaultUnitRegistry;
    this.onDiagnostic = context.onDiagnostic;
  }

  /**
   * Wrap a numeric sequence with units and frame metadata.
   *
   * A recognized `xtype` token decides the family AND the frame, overriding an
   * explicitly passed `frame`. Otherwise the family is inferred from `unit`.
   *
   * @param values - Copied into an owned buffer
   * @throws UnknownUnitError if `xtype` is not recognized and `unit` is not registered
   */
  static create(
    values: ArrayLike<number>,
    unit: string,
    options: AxisOptions = {}
  ): SpectroscopicAxis {
    const registry = options.registry ?? defaultUnitRegistry;
    const { xtype, onDiagnostic } = options;
    const notices: AxisDiagnostic[] = [];

    let family: QuantityFamily;
    let frame = options.frame ?? DEFAULT_FRAME;

    if (xtype !== undefined && registry.isAxisType(xtype)) {
      const implied = registry.familyAndFrameOf(xtype);
      family = implied.family;
      if (options.frame !== undefined && options.frame !== implied.frame) {
        notices.push({
          level: 'info',
          code: 'frame-overridden',
          message: `Axis type ${xtype} implies frame ${implied.frame}; ignoring ${options.frame}`,
          axisType: xtype,
          requestedFrame: options.frame,
          frame: implied.frame,
        });
      }
      frame = implied.frame;
    } else {
      family = registry.familyOf(unit);
      if (xtype !== undefined) {
        notices.push({
          level: 'warn',
          code: 'axis-type-ignored',
          message: `Unrecognized axis type ${xtype}; inferred ${family} from "${unit}"`,
          axisType: xtype,
          inferredFamily: family,
        });
      }
    }

    const axis = new SpectroscopicAxis(
      {
        values: Float64Array.from(values),
        units: unit,
        frame,
        xtype: family,
        reffreq: options.reffreq,
        redshift: options.redshift,
      },
      { registry, onDiagnostic }
    );
    for (const notice of notices) axis.emit(notice);
    return axis;
  }

  /**
   * Rebuild an axis from {@link toSnapshot} output
   * @throws InvalidSnapshotError if the snapshot is malformed or its xtype contradicts its units
   */
  static fromSnapshot(snapshot: unknown, context: AxisContext = {}): SpectroscopicAxis {
    const parsed = AxisSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      const issues = toValidationIssues(parsed.error);
      throw new InvalidSnapshotError(
        `Invalid axis snapshot: ${formatValidationIssues(issues)}`,
        issues
      );
    }

    const data = parsed.data;
    const registry = context.registry ?? defaultUnitRegistry;
    if (registry.hasUnit(data.units)) {
      const family = registry.familyOf(data.units);
      if (family !== data.xtype) {
        throw new InvalidSnapshotError(
          `Snapshot xtype ${data.xtype} does not match units "${data.units}" (${family})`,
          [{ path: ['xtype'], message: `expected ${family}` }]
        );
      }
    }

    return new SpectroscopicAxis(
      {
        values: Float64Array.from(data.values),
        units: data.units,
        frame: data.frame,
        xtype: data.xtype,
        reffreq: data.reffreq,
        redshift: data.redshift,
      },
      { registry, onDiagnostic: context.onDiagnostic }
    );
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  /** Live view of the coordinate samples */
  get values(): Float64Array {
    return this.buffer;
  }

  get units(): string {
    return this.currentUnits;
  }

  get frame(): FrameLabel {
    return this.currentFrame;
  }

  get xtype(): QuantityFamily {
    return this.currentXtype;
  }

  get length(): number {
    return this.buffer.length;
  }

  at(index: number): number | undefined {
    return this.buffer.at(index);
  }

  toArray(): number[] {
    return Array.from(this.buffer);
  }

  [Symbol.iterator](): Iterator<number> {
    return this.buffer[Symbol.iterator]();
  }

  /** Independent copy sharing the registry and listener */
  clone(): SpectroscopicAxis {
    return new SpectroscopicAxis(
      {
        values: this.buffer.slice(),
        units: this.currentUnits,
        frame: this.currentFrame,
        xtype: this.currentXtype,
        reffreq: this.reffreq,
        redshift: this.redshift,
      },
      { registry: this.registry, onDiagnostic: this.onDiagnostic }
    );
  }

  toSnapshot(): AxisSnapshot {
    const snapshot: AxisSnapshot = {
      values: this.toArray(),
      units: this.currentUnits,
      frame: this.currentFrame,
      xtype: this.currentXtype,
    };
    if (this.reffreq !== undefined) snapshot.reffreq = this.reffreq;
    if (this.redshift !== undefined) snapshot.redshift = this.redshift;
    return snapshot;
  }

  // ==========================================================================
  // Conversions
  // ==========================================================================

  /**
   * Convert to another unit of the same family, in place.
   *
   * Same units and frame is a no-op reported through the diagnostic listener.
   * Frame transforms (LSR, heliocentric, ...) are not implemented.
   *
   * @throws FrameConversionUnsupportedError if `targetFrame` differs from the current frame
   * @throws IncompatibleFamilyError if `targetUnit` belongs to another family
   * @throws UnknownUnitError if `targetUnit` is not registered at all
   */
  convertTo(targetUnit: string, targetFrame: FrameLabel = DEFAULT_FRAME): ConvertStatus {
    if (targetUnit === this.currentUnits && targetFrame === this.currentFrame) {
      this.emit({
        level: 'info',
        code: 'already-in-units',
        message: 'Already in desired units and frame',
        units: this.currentUnits,
        frame: this.currentFrame,
      });
      return 'unchanged';
    }

    if (targetFrame !== this.currentFrame) {
      throw new FrameConversionUnsupportedError(this.currentFrame, targetFrame);
    }

    const family = this.currentXtype;
    if (!this.registry.isUnitOf(family, targetUnit)) {
      if (this.registry.hasUnit(targetUnit)) {
        throw new IncompatibleFamilyError(targetUnit, family, this.registry.familyOf(targetUnit));
      }
      throw new UnknownUnitError(targetUnit, family);
    }

    const factor =
      this.registry.scaleFactor(family, this.currentUnits) /
      this.registry.scaleFactor(family, targetUnit);
    scaleInPlace(this.buffer, factor);
    this.currentUnits = targetUnit;
    return 'converted';
  }

  /**
   * Turn a velocity axis into a frequency axis, in place.
   *
   * @param centerFrequency - Rest frequency of the line, in `frequencyUnits`
   * @throws MissingParameterError if `centerFrequency` is absent
   * @throws InvalidUnitError if `frequencyUnits` is not a frequency unit
   * @throws UnknownConventionError
   * @throws IncompatibleFamilyError if the axis is not velocity-typed
   */
  velocityToFrequency(
    centerFrequency: number | null | undefined,
    options: VelocityToFrequencyOptions = {}
  ): void {
    const { frequencyUnits = DEFAULT_FREQUENCY_UNIT, convention = DEFAULT_DOPPLER_CONVENTION } =
      options;

    const f0 = requireCenterFrequency(
      centerFrequency,
      'Cannot convert velocity to frequency without specifying a central frequency'
    );
    const frequencyScale = this.requireUnit('frequency', frequencyUnits);
    const doppler = assertDopplerConvention(convention);
    const velocityScale = this.requireAxisFamily('velocity');

    const f0Hz = f0 * frequencyScale;
    const values = this.buffer;
    for (let i = 0; i < values.length; i++) {
      values[i] = velocityToFrequencyHz(values[i] * velocityScale, f0Hz, doppler) / frequencyScale;
    }
    this.currentUnits = frequencyUnits;
    this.currentXtype = 'frequency';
  }

  /**
   * Turn a frequency axis into a velocity axis, in place.
   *
   * @param centerFrequency - Rest frequency of the line, in `centerFrequencyUnits`
   * @throws MissingParameterError if `centerFrequency` is absent
   * @throws InvalidUnitError if either unit option is not registered for its role
   * @throws UnknownConventionError
   * @throws IncompatibleFamilyError if the axis is not frequency-typed
   */
  frequencyToVelocity(
    centerFrequency: number | null | undefined,
    options: FrequencyToVelocityOptions = {}
  ): void {
    const {
      centerFrequencyUnits = DEFAULT_FREQUENCY_UNIT,
      velocityUnits = DEFAULT_VELOCITY_UNIT,
      convention = DEFAULT_DOPPLER_CONVENTION,
    } = options;

    const f0 = requireCenterFrequency(
      centerFrequency,
      'Cannot convert frequency to velocity without specifying a central frequency'
    );
    const centerScale = this.requireUnit('frequency', centerFrequencyUnits);
    const velocityScale = this.requireUnit('velocity', velocityUnits);
    const doppler = assertDopplerConvention(convention);
    const frequencyScale = this.requireAxisFamily('frequency');

    const f0Hz = f0 * centerScale;
    const values = this.buffer;
    for (let i = 0; i < values.length; i++) {
      values[i] = frequencyToVelocityMs(values[i] * frequencyScale, f0Hz, doppler) / velocityScale;
    }
    this.currentUnits = velocityUnits;
    this.currentXtype = 'velocity';
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private emit(event: AxisDiagnostic): void {
    this.onDiagnostic?.(event);
  }

  /** Scale factor of a unit argument, or InvalidUnitError */
  private requireUnit(family: QuantityFamily, unit: string): number {
    if (!this.registry.isUnitOf(family, unit)) {
      throw new InvalidUnitError(unit, family);
    }
    return this.registry.scaleFactor(family, unit);
  }

  /** Scale factor of the axis's own units, provided the axis has the given family */
  private requireAxisFamily(family: QuantityFamily): number {
    if (this.currentXtype !== family) {
      throw new IncompatibleFamilyError(this.currentUnits, family, this.currentXtype);
    }
    return this.registry.scaleFactor(family, this.currentUnits);
  }
}

function requireCenterFrequency(value: number | null | undefined, message: string): number {
  if (value === undefined || value === null) {
    throw new MissingParameterError('centerFrequency', message);
  }
  if (!isFiniteNumber(value) || value <= 0) {
    throw new InvalidParameterError('centerFrequency', value, 'expected a positive finite number');
  }
  return value;
}
