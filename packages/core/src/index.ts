/**
 * flowgraph - Core
 *
 * Shared infrastructure for the workflow engine and its adapters:
 *
 * - Error taxonomy with codes
 * - Structured logging and telemetry context
 * - Environment configuration
 *
 * @module @flowgraph/core
 */

export * from './errors.js';
export * from './telemetry/index.js';
export * from './config.js';
