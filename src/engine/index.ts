/**
 * Engine exports.
 */

export * from './condition-waiter';
export * from './event-log';
export * from './expectations';
export * from './orchestrator';
export * from './resource-scope';
export * from './state-machine';
