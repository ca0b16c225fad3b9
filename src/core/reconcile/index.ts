import { reconcile } from './path-set-reconciler';
import { WorkingCopyStatus } from './working-copy-status';
import { StatusFlag } from './types';
import type { DeclaredPathSet, ExistenceOracle, ReconciliationResult } from './types';

export { reconcile, WorkingCopyStatus, StatusFlag };
export type { DeclaredPathSet, ExistenceOracle, ReconciliationResult };
