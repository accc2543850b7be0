/**
 * GraphQA - Utilities Module
 *
 * Barrel export file for all utility functions and types
 */

export * from './logger.js';
export * from './types.js';
export * from './helpers.js';
