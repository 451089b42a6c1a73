export * from './lint-config';
