export * from './builder';
export * from './validator';
