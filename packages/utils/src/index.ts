/**
 * @tickcast/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';

// Math utilities
export * from './math/calculations';

// Validation utilities
export * from './validation/env-validator';
