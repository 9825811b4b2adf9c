/**
 * @spectral-axis/shared
 * Shared types, constants, and utilities for spectral-axis
 */

export * from './types/index.js';
export * from './constants/index.js';
export * from './utils/index.js';
