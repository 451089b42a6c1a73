/**
 * cluster-upgrade-lint
 *
 * Upgrade-readiness rule engine: pluggable checks evaluated against a
 * cluster through a read-only resource Reader.
 */

export * from './errors';
export * from './logging';
export * from './config';
export * from './version';
export * from './kube';
export * from './lint/check';
export * from './lint/result';
export * from './lint/validate';
export * from './lint/checks';
export * from './lint/output';
export * from './lint/lint-command';
