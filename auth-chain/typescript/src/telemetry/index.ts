/**
 * Auth Chain Telemetry
 */

export * from './logging.js';
