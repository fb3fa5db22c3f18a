/**
 * @pipewright/core - Core utilities for Pipewright
 *
 * This module provides the foundations shared by the engine and the CLI:
 * - Reliability: error taxonomy, exit codes, bounded retry
 * - Telemetry: run-scoped context and structured logging
 * - Config: layered, validated configuration
 * - Storage: run-report persistence (SQLite default, in-memory for tests)
 */

// Reliability exports
export * from './reliability/index.js';

// Telemetry exports
export * from './telemetry/index.js';

// Config exports
export * from './config/index.js';

// Storage exports
export * from './storage/index.js';
