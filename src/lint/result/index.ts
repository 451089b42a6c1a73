export * from './diagnostic-result';
export * from './results';
