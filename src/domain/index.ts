/**
 * Domain model exports.
 */

export * from './collaborator';
export * from './errors';
export * from './events';
export * from './polling';
export * from './scenario';
export * from './tolerance';
