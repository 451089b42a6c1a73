export * from './component';
export * from './workload';
