export * from './resource-types';
export * from './objects';
export * from './reader';
export * from './cluster';
