export * from './actor-group.js';
export * from './http-server.js';
export * from './signals.js';
