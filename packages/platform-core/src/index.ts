/**
 * Platform Core - shared runtime pieces for the bloxstack services:
 * - structured logging with request correlation
 * - the domain error model and the wire error envelope
 * - lifecycle: actor group, HTTP serve loop, signal actor
 * - Prometheus metrics
 */

export * from './error-handling/index.js';
export * from './logging/index.js';
export * from './metrics/index.js';
export * from './lifecycle/index.js';

export const PLATFORM_VERSION = '1.0.0';
