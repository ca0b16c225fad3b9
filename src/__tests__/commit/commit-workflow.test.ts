import { CommitWorkflow, CommitWorkflowDependencies } from '../../core/commit';
import {
  ConflictException,
  EmptyCommitException,
  ExternalToolException,
  MarkCommittedException,
  UsageException,
  UserAbortException,
} from '../../core/exceptions';
import { AdvisoryWarning, Decision, DecisionPolicy } from '../../core/policy';
import { StatusFlag, WorkingCopyStatus } from '../../core/reconcile';
import { RevisionRef, ReviewService } from '../../core/service';
import { CommitEncoding, CommitOutcome, VcsBackend } from '../../core/vcs';
import { FakeOracle } from '../reconcile/test-helpers';

jest.mock('../../utils/cli/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

const MESSAGE = 'Fix the widget\n\nSummary: Handles ü and ✓ in labels.';

class FakeReviewService implements ReviewService {
  readonly marked: number[] = [];
  readonly pathRequests: number[] = [];

  constructor(
    private readonly revisions: RevisionRef[],
    private readonly paths: Record<number, string[]> = {}
  ) {}

  async findCommittableRevisions(): Promise<RevisionRef[]> {
    return this.revisions;
  }

  async getCommitPaths(revisionId: number): Promise<string[]> {
    this.pathRequests.push(revisionId);
    return this.paths[revisionId] ?? [];
  }

  async getCommitMessage(): Promise<string> {
    return MESSAGE;
  }

  markFailure: Error | null = null;

  async markCommitted(revisionId: number): Promise<void> {
    if (this.markFailure) throw this.markFailure;
    this.marked.push(revisionId);
  }
}

class FakeBackend implements VcsBackend {
  readonly kind = 'svn' as const;
  readonly supportsPathCommit = true;
  readonly commits: Array<{ paths: readonly string[]; message: string; encoding: CommitEncoding }> =
    [];

  constructor(
    private readonly status: WorkingCopyStatus,
    private readonly outcome: CommitOutcome = { exitCode: 0, output: '' }
  ) {}

  readonly statusEncodings: CommitEncoding[] = [];

  async getStatus(encoding: CommitEncoding): Promise<WorkingCopyStatus> {
    this.statusEncodings.push(encoding);
    return this.status;
  }

  async commit(
    paths: readonly string[],
    message: string,
    encoding: CommitEncoding
  ): Promise<CommitOutcome> {
    this.commits.push({ paths, message, encoding });
    return this.outcome;
  }

  describeCommit(): string {
    return 'svn commit';
  }
}

class ScriptedPolicy implements DecisionPolicy {
  readonly seen: AdvisoryWarning[] = [];

  constructor(private readonly decisions: Decision[] = []) {}

  async decide(warning: AdvisoryWarning): Promise<Decision> {
    this.seen.push(warning);
    return this.decisions.shift() ?? 'proceed';
  }
}

const revision = (id: number, sourcePath: string | null = null): RevisionRef => ({
  id,
  name: `Change ${id}`,
  sourcePath,
});

const encoding: CommitEncoding = { locale: 'en_US.UTF-8', charset: 'UTF-8' };

interface Setup {
  revisions?: RevisionRef[];
  paths?: Record<number, string[]>;
  status?: Record<string, number>;
  present?: string[];
  decisions?: Decision[];
  outcome?: CommitOutcome;
  remoteHooksInstalled?: boolean;
  backend?: () => VcsBackend;
}

const setup = (options: Setup = {}) => {
  const service = new FakeReviewService(options.revisions ?? [revision(12)], options.paths ?? {});
  const backend = new FakeBackend(
    new WorkingCopyStatus(Object.entries(options.status ?? {})),
    options.outcome
  );
  const policy = new ScriptedPolicy(options.decisions);
  const backendFactory = jest.fn(options.backend ?? (() => backend));
  const chooseRevision = jest.fn(async (revisions: readonly RevisionRef[]) => {
    const last = revisions[revisions.length - 1];
    if (!last) throw new Error('no revisions offered');
    return last;
  });

  const deps: CommitWorkflowDependencies = {
    service,
    backend: backendFactory,
    workingCopy: {
      root: '/wc',
      remoteHooksInstalled: options.remoteHooksInstalled ?? false,
      encoding,
    },
    policy,
    chooseRevision,
    createOracle: () => new FakeOracle(options.present ?? []),
  };

  return {
    workflow: new CommitWorkflow(deps),
    service,
    backend,
    policy,
    backendFactory,
    chooseRevision,
  };
};

describe('CommitWorkflow', () => {
  describe('revision resolution', () => {
    test('uses the only committable revision without asking', async () => {
      const { workflow, chooseRevision } = setup({ revisions: [revision(12)] });

      await expect(workflow.resolveRevision({ ownerId: 'USER-1' })).resolves.toEqual(revision(12));
      expect(chooseRevision).not.toHaveBeenCalled();
    });

    test('asks the chooser when several revisions are committable', async () => {
      const revisions = [revision(12), revision(15)];
      const { workflow, chooseRevision } = setup({ revisions });

      await expect(workflow.resolveRevision({ ownerId: 'USER-1' })).resolves.toEqual(revision(15));
      expect(chooseRevision).toHaveBeenCalledWith(revisions);
    });

    test('uses the requested revision when it is committable', async () => {
      const { workflow, chooseRevision } = setup({ revisions: [revision(12), revision(15)] });

      await expect(
        workflow.resolveRevision({ ownerId: 'USER-1', revisionId: 12 })
      ).resolves.toEqual(revision(12));
      expect(chooseRevision).not.toHaveBeenCalled();
    });

    test('rejects a requested revision that is not committable', async () => {
      const { workflow } = setup({ revisions: [revision(12)] });

      await expect(
        workflow.resolveRevision({ ownerId: 'USER-1', revisionId: 99 })
      ).rejects.toMatchObject({
        name: 'UsageException',
        message:
          "Revision D99 is not committable. You can only commit revisions you own which have been 'accepted'.",
      });
    });

    test('fails when nothing is committable', async () => {
      const { workflow } = setup({ revisions: [] });

      await expect(workflow.run({ ownerId: 'USER-1' })).rejects.toBeInstanceOf(UsageException);
    });
  });

  test('shows the commit message without touching the working copy', async () => {
    const { workflow, backendFactory, service } = setup({ paths: { 12: ['a.txt'] } });

    const result = await workflow.run({ ownerId: 'USER-1', show: true });

    expect(result).toEqual({ kind: 'shown', revision: revision(12), message: MESSAGE });
    expect(backendFactory).not.toHaveBeenCalled();
    expect(service.pathRequests).toEqual([]);
  });

  test('commits the declared paths after the unincluded edit is confirmed', async () => {
    const { workflow, backend, policy, service } = setup({
      paths: { 12: ['a.txt', 'b.txt'] },
      status: { 'a.txt': StatusFlag.MODIFIED, 'b.txt': StatusFlag.MODIFIED, 'c.txt': StatusFlag.MODIFIED },
      present: ['a.txt', 'b.txt', 'c.txt'],
    });

    const result = await workflow.run({ ownerId: 'USER-1' });

    expect(policy.seen).toEqual([{ category: 'unincluded-modifications', paths: ['c.txt'] }]);
    expect(backend.statusEncodings).toEqual([encoding]);
    expect(backend.commits).toEqual([{ paths: ['a.txt', 'b.txt'], message: MESSAGE, encoding }]);
    expect(service.marked).toEqual([12]);
    expect(result).toEqual({
      kind: 'committed',
      revision: revision(12),
      message: MESSAGE,
      reconciliation: {
        finalPaths: ['a.txt', 'b.txt'],
        unincludedModifications: ['c.txt'],
        missingPaths: [],
      },
      markedCommitted: true,
    });
  });

  test('leaves marking to the server when remote hooks are installed', async () => {
    const { workflow, service } = setup({
      paths: { 12: ['a.txt'] },
      present: ['a.txt'],
      remoteHooksInstalled: true,
    });

    const result = await workflow.run({ ownerId: 'USER-1' });

    expect(service.marked).toEqual([]);
    expect(result).toMatchObject({ kind: 'committed', markedCommitted: false });
  });

  test('commits a staged deletion without warning', async () => {
    const { workflow, backend, policy } = setup({
      paths: { 12: ['del.txt'] },
      status: { 'del.txt': StatusFlag.DELETED },
    });

    await workflow.run({ ownerId: 'USER-1' });

    expect(policy.seen).toEqual([]);
    expect(backend.commits[0]?.paths).toEqual(['del.txt']);
  });

  test('warns about unincluded edits before missing paths', async () => {
    const { workflow, policy, backend } = setup({
      paths: { 12: ['a.txt', 'gone.txt'] },
      status: { 'c.txt': StatusFlag.MODIFIED },
      present: ['a.txt', 'c.txt'],
    });

    await workflow.run({ ownerId: 'USER-1' });

    expect(policy.seen.map((warning) => warning.category)).toEqual([
      'unincluded-modifications',
      'missing-paths',
    ]);
    expect(backend.commits[0]?.paths).toEqual(['a.txt']);
  });

  test('aborts without committing when a warning is declined', async () => {
    const { workflow, backend, service } = setup({
      paths: { 12: ['a.txt'] },
      status: { 'c.txt': StatusFlag.MODIFIED },
      present: ['a.txt', 'c.txt'],
      decisions: ['abort'],
    });

    await expect(workflow.run({ ownerId: 'USER-1' })).rejects.toBeInstanceOf(UserAbortException);
    expect(backend.commits).toEqual([]);
    expect(service.marked).toEqual([]);
  });

  test('fails on a directory conflict before any warning', async () => {
    const { workflow, backend, policy } = setup({
      paths: { 12: ['dir/', 'gone.txt'] },
      status: { 'other.txt': StatusFlag.MODIFIED, 'dir/x.txt': StatusFlag.MODIFIED },
      present: ['dir/'],
    });

    await expect(workflow.run({ ownerId: 'USER-1' })).rejects.toMatchObject({
      name: 'ConflictException',
      directory: 'dir/',
      path: 'dir/x.txt',
    });
    expect(policy.seen).toEqual([]);
    expect(backend.commits).toEqual([]);
  });

  test('fails when nothing is left to commit', async () => {
    const { workflow, backend, policy } = setup({ paths: { 12: ['gone.txt'] } });

    const run = workflow.run({ ownerId: 'USER-1' });

    await expect(run).rejects.toBeInstanceOf(EmptyCommitException);
    await expect(run).rejects.toMatchObject({ missingPaths: ['gone.txt'] });
    expect(policy.seen).toEqual([]);
    expect(backend.commits).toEqual([]);
  });

  test('confirms before committing a revision made in another working copy', async () => {
    const { workflow, policy, service } = setup({
      revisions: [revision(12, '/home/dev/old-checkout')],
      paths: { 12: ['a.txt'] },
      present: ['a.txt'],
      decisions: ['abort'],
    });

    await expect(workflow.run({ ownerId: 'USER-1' })).rejects.toBeInstanceOf(UserAbortException);
    expect(policy.seen).toEqual([
      {
        category: 'source-path-mismatch',
        sourcePath: '/home/dev/old-checkout',
        workingCopyRoot: '/wc',
      },
    ]);
    expect(service.pathRequests).toEqual([]);
  });

  test('does not ask when the revision came from this working copy', async () => {
    const { workflow, policy } = setup({
      revisions: [revision(12, '/wc/')],
      paths: { 12: ['a.txt'] },
      present: ['a.txt'],
    });

    await workflow.run({ ownerId: 'USER-1' });

    expect(policy.seen).toEqual([]);
  });

  test('surfaces a failed commit once and does not mark the revision', async () => {
    const { workflow, backend, service } = setup({
      paths: { 12: ['a.txt'] },
      present: ['a.txt'],
      outcome: { exitCode: 1, output: "svn: E155011: File 'a.txt' is out of date" },
    });

    const run = workflow.run({ ownerId: 'USER-1' });

    await expect(run).rejects.toBeInstanceOf(ExternalToolException);
    await expect(run).rejects.toMatchObject({
      exitCode: 1,
      output: "svn: E155011: File 'a.txt' is out of date",
    });
    expect(backend.commits).toHaveLength(1);
    expect(service.marked).toEqual([]);
  });

  test('propagates an unsupported backend as a usage error', async () => {
    const { workflow, service } = setup({
      paths: { 12: ['a.txt'] },
      backend: () => {
        throw new UsageException('revcommit commit is only supported under Subversion.');
      },
    });

    await expect(workflow.run({ ownerId: 'USER-1' })).rejects.toBeInstanceOf(UsageException);
    expect(service.pathRequests).toEqual([]);
  });

  test('reports conflicts as ConflictException instances', async () => {
    const { workflow } = setup({
      paths: { 12: ['.'] },
      status: { 'a.txt': StatusFlag.MODIFIED },
      present: ['.'],
    });

    await expect(workflow.run({ ownerId: 'USER-1' })).rejects.toBeInstanceOf(ConflictException);
  });

  test('reports a failed mark as distinct from a failed commit', async () => {
    const { workflow, backend, service } = setup({
      paths: { 12: ['a.txt'] },
      present: ['a.txt'],
    });
    service.markFailure = new Error('ERR-CONDUIT-CORE: timeout');

    const run = workflow.run({ ownerId: 'USER-1' });

    await expect(run).rejects.toBeInstanceOf(MarkCommittedException);
    await expect(run).rejects.toMatchObject({
      revisionId: 12,
      committedPaths: ['a.txt'],
      message: 'D12 was committed, but marking it committed on the review service failed: ERR-CONDUIT-CORE: timeout',
    });
    expect(backend.commits).toHaveLength(1);
  });
});
