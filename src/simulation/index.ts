export * from './simulated-device';
export * from './device-suites';
