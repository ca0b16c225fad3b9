import { CommitWorkflow } from './commit-workflow';
import type {
  CommitOptions,
  CommitResult,
  CommitWorkflowDependencies,
  RevisionChooser,
  WorkingCopyContext,
} from './types';

export { CommitWorkflow };
export type {
  CommitOptions,
  CommitResult,
  CommitWorkflowDependencies,
  RevisionChooser,
  WorkingCopyContext,
};
