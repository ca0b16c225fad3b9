import { runProcess } from './process-runner';
import { parseSvnStatus } from './svn-status-parser';
import { SubversionBackend } from './subversion-backend';
import { FileSystemOracle } from './existence-oracle';
import { detectBackend, createBackend } from './backend-factory';
import type { BackendOptions } from './backend-factory';
import type { SubversionBackendOptions } from './subversion-backend';
import type {
  BackendKind,
  CommitEncoding,
  CommitOutcome,
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
  VcsBackend,
} from './types';

export {
  runProcess,
  parseSvnStatus,
  SubversionBackend,
  FileSystemOracle,
  detectBackend,
  createBackend,
};
export type {
  BackendOptions,
  SubversionBackendOptions,
  BackendKind,
  CommitEncoding,
  CommitOutcome,
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
  VcsBackend,
};
