import { WorkingCopyStatus } from '@/core/reconcile';

export type BackendKind = 'svn' | 'git';

/**
 * Encoding settings handed to every VCS call. The locale keeps non-ASCII
 * paths in status output and message bytes in commits unescaped.
 */
export interface CommitEncoding {
  /** Value for LANG / LC_ALL, e.g. en_US.UTF-8 */
  locale: string;
  /** Charset of the log message, e.g. UTF-8 */
  charset: string;
}

export interface CommitOutcome {
  exitCode: number;
  output: string;
}

export interface VcsBackend {
  readonly kind: BackendKind;
  /** Whether the backend can commit an explicit list of paths */
  readonly supportsPathCommit: boolean;
  getStatus(encoding: CommitEncoding): Promise<WorkingCopyStatus>;
  commit(paths: readonly string[], message: string, encoding: CommitEncoding): Promise<CommitOutcome>;
  /** The command line that `commit` would run, for display */
  describeCommit(paths: readonly string[], message: string): string;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ProcessOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /** Echo output to this process's stdout/stderr as it arrives */
  echo?: boolean;
}

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: ProcessOptions
) => Promise<ProcessResult>;
