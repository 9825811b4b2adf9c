/**
 * Unit registry: scale factors, unit -> family inference, and
 * axis-type -> (family, frame) inference for spectroscopic axes
 */

import { readFileSync } from 'fs';
import { QUANTITY_FAMILIES } from '@spectral-axis/shared';
import type { FrameLabel, QuantityFamily } from '@spectral-axis/shared';
import { RegistryConfigError, UnknownAxisTypeError, UnknownUnitError } from '../errors/index.js';
import {
  RegistryConfigSchema,
  formatValidationIssues,
  toValidationIssues,
} from '../schema/index.js';
import type { AxisTypeEntry, RegistryConfig } from '../schema/index.js';

// ============================================================================
// Registry
// ============================================================================

/**
 * Immutable lookup tables. Build once (see {@link createUnitRegistry}) and pass
 * to every axis that should use it.
 *
 * The unit -> family map is derived from the per-family scale tables, so a unit
 * always maps to the family whose table holds its scale factor. Each axis-type
 * token carries its family and frame together.
 */
export class UnitRegistry {
  private readonly scales: ReadonlyMap<QuantityFamily, ReadonlyMap<string, number>>;
  private readonly unitFamilies: ReadonlyMap<string, QuantityFamily>;
  private readonly axisTypeEntries: ReadonlyMap<string, Readonly<AxisTypeEntry>>;

  constructor(config: unknown) {
    const parsed = RegistryConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = toValidationIssues(parsed.error);
      throw new RegistryConfigError(
        `Invalid unit registry configuration: ${formatValidationIssues(issues)}`,
        issues
      );
    }

    const scales = new Map<QuantityFamily, ReadonlyMap<string, number>>();
    const unitFamilies = new Map<string, QuantityFamily>();

    for (const family of QUANTITY_FAMILIES) {
      const table = parsed.data.families[family];
      if (!table) continue;

      const entries = new Map<string, number>();
      for (const [unit, factor] of Object.entries(table)) {
        const owner = unitFamilies.get(unit);
        if (owner !== undefined) {
          throw new RegistryConfigError(
            `Unit "${unit}" is registered under both ${owner} and ${family}`,
            [{ path: ['families', family, unit], message: `already registered under ${owner}` }]
          );
        }
        unitFamilies.set(unit, family);
        entries.set(unit, factor);
      }
      scales.set(family, entries);
    }

    const axisTypeEntries = new Map<string, Readonly<AxisTypeEntry>>();
    for (const [token, entry] of Object.entries(parsed.data.axisTypes)) {
      axisTypeEntries.set(token, Object.freeze({ family: entry.family, frame: entry.frame }));
    }

    this.scales = scales;
    this.unitFamilies = unitFamilies;
    this.axisTypeEntries = axisTypeEntries;
    Object.freeze(this);
  }

  /**
   * How many canonical SI units (m, Hz, m/s) one `unitName` equals
   * @throws UnknownUnitError if `unitName` is not registered under `family`
   */
  scaleFactor(family: QuantityFamily, unitName: string): number {
    const factor = this.scales.get(family)?.get(unitName);
    if (factor === undefined) {
      throw new UnknownUnitError(unitName, family);
    }
    return factor;
  }

  /**
   * @throws UnknownUnitError if `unitName` is not registered
   */
  familyOf(unitName: string): QuantityFamily {
    const family = this.unitFamilies.get(unitName);
    if (family === undefined) {
      throw new UnknownUnitError(unitName);
    }
    return family;
  }

  /**
   * Family and frame implied by an axis-type token such as "VLSR" or "FREQ"
   * @throws UnknownAxisTypeError if `axisType` is not registered
   */
  familyAndFrameOf(axisType: string): { family: QuantityFamily; frame: FrameLabel } {
    const entry = this.axisTypeEntries.get(axisType);
    if (entry === undefined) {
      throw new UnknownAxisTypeError(axisType);
    }
    return { family: entry.family, frame: entry.frame };
  }

  hasUnit(unitName: string): boolean {
    return this.unitFamilies.has(unitName);
  }

  isUnitOf(family: QuantityFamily, unitName: string): boolean {
    return this.scales.get(family)?.has(unitName) ?? false;
  }

  /** Registered unit names of a family, in registration order */
  unitsOf(family: QuantityFamily): readonly string[] {
    const table = this.scales.get(family);
    return table ? Array.from(table.keys()) : [];
  }

  isAxisType(token: string): boolean {
    return this.axisTypeEntries.has(token);
  }

  axisTypes(): readonly string[] {
    return Array.from(this.axisTypeEntries.keys());
  }

  /**
   * Copy of the tables in configuration form; `createUnitRegistry(r.toConfig())`
   * builds an equivalent registry
   */
  toConfig(): RegistryConfig {
    const families: RegistryConfig['families'] = {};
    for (const [family, table] of this.scales) {
      families[family] = Object.fromEntries(table);
    }
    const axisTypes: RegistryConfig['axisTypes'] = {};
    for (const [token, entry] of this.axisTypeEntries) {
      axisTypes[token] = { family: entry.family, frame: entry.frame };
    }
    return { families, axisTypes };
  }
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Validate a configuration and build a registry from it
 * @throws RegistryConfigError if the configuration is malformed
 */
export function createUnitRegistry(config: unknown): UnitRegistry {
  return new UnitRegistry(config);
}

/**
 * Read the bundled unit tables
 */
export function loadDefaultConfig(): RegistryConfig {
  const text = readFileSync(new URL('./unit-tables.json', import.meta.url), 'utf8');
  const data: unknown = JSON.parse(text);
  const parsed = RegistryConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    throw new RegistryConfigError(
      `Bundled unit tables are invalid: ${formatValidationIssues(issues)}`,
      issues
    );
  }
  return parsed.data;
}

/** Registry built from the bundled tables at module load */
export const defaultUnitRegistry: UnitRegistry = createUnitRegistry(loadDefaultConfig());
