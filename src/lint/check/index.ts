export * from './constants';
export * from './types';
export * from './condition';
export * from './context';
export * from './base-check';
export * from './selector';
export * from './registry';
export * from './executor';
export * from './verbose-formatter';
