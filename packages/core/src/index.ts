/**
 * @spectral-axis/core
 * Unit registry, Doppler conventions, and the spectroscopic axis
 */

export * from './errors/index.js';
export * from './diagnostics/index.js';
export * from './schema/index.js';
export * from './units/index.js';
export * from './doppler/index.js';
export * from './axis/index.js';
