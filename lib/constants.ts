/**
 * Centralized constants for the interpolation core
 */

// Time constants
export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Numeric tolerances
export const INTERPOLATION_EPSILON = 1e-4; // Tolerance for comparing interpolated values

// Yield curve analysis tenors (years)
export const SHORT_TENOR_YEARS = 1;
export const MEDIUM_TENOR_YEARS = 5;
export const LONG_TENOR_YEARS = 15;

// Logging
export const DEFAULT_LOG_TIMEZONE = 'UTC';
