export * from './core/exceptions';
export * from './core/reconcile';
export * from './core/policy';
export * from './core/service';
export * from './core/vcs';
export * from './core/commit';
export * from './core/config';
export { WorkingCopy } from './core/working-copy';
