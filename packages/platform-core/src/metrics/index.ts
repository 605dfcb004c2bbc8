export * from './types.js';
export * from './prometheus-metrics.js';
