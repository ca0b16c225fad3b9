import { commitCommand } from './commit/commit';
import { markCommittedCommand } from './mark-committed/mark-committed';

export { commitCommand, markCommittedCommand };
