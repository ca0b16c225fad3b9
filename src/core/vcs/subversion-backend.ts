import { ExternalToolException } from '@/core/exceptions';
import { WorkingCopyStatus } from '@/core/reconcile';
import { runProcess } from './process-runner';
import { parseSvnStatus } from './svn-status-parser';
import { CommitEncoding, CommitOutcome, ProcessRunner, VcsBackend } from './types';

export interface SubversionBackendOptions {
  root: string;
  binary?: string;
  run?: ProcessRunner;
}

export class SubversionBackend implements VcsBackend {
  readonly kind = 'svn' as const;
  readonly supportsPathCommit = true;

  private readonly root: string;
  private readonly binary: string;
  private readonly run: ProcessRunner;

  constructor(options: SubversionBackendOptions) {
    this.root = options.root;
    this.binary = options.binary ?? 'svn';
    this.run = options.run ?? runProcess;
  }

  async getStatus(encoding: CommitEncoding): Promise<WorkingCopyStatus> {
    const result = await this.run(this.binary, ['status', '--non-interactive'], {
      cwd: this.root,
      env: this.localeEnv(encoding),
    });

    if (result.exitCode !== 0) {
      throw new ExternalToolException(
        `${this.binary} status`,
        `Executing '${this.binary} status' failed!`,
        result.exitCode,
        result.stderr
      );
    }

    return parseSvnStatus(result.stdout);
  }

  async commit(
    paths: readonly string[],
    message: string,
    encoding: CommitEncoding
  ): Promise<CommitOutcome> {
    const result = await this.run(this.binary, this.commitArgs(paths, message, encoding), {
      cwd: this.root,
      env: this.localeEnv(encoding),
      echo: true,
    });

    return { exitCode: result.exitCode, output: result.stderr || result.stdout };
  }

  describeCommit(paths: readonly string[], message: string): string {
    const quote = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`;
    return [this.binary, 'commit', '-m', quote(message), '--', ...paths.map(quote)].join(' ');
  }

  private localeEnv(encoding: CommitEncoding): NodeJS.ProcessEnv {
    return { ...process.env, LANG: encoding.locale, LC_ALL: encoding.locale };
  }

  private commitArgs(paths: readonly string[], message: string, encoding: CommitEncoding): string[] {
    return [
      'commit',
      '--non-interactive',
      '--encoding',
      encoding.charset,
      '-m',
      message,
      '--',
      ...paths,
    ];
  }
}
