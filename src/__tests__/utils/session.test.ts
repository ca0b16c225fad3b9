import { ReviewService } from '../../core/service';
import { ProgressReviewService } from '../../utils/helpers/session';
import { spinner } from '../../utils/cli/spinner';

jest.mock('../../utils/cli/spinner', () => ({
  spinner: {
    wrap: jest.fn((_text: string, task: () => Promise<unknown>) => task()),
  },
}));

const mockWrap = jest.mocked(spinner.wrap);

describe('ProgressReviewService', () => {
  let inner: jest.Mocked<ReviewService>;

  beforeEach(() => {
    jest.clearAllMocks();

    inner = {
      findCommittableRevisions: jest
        .fn()
        .mockResolvedValue([{ id: 7, name: 'Tidy', sourcePath: null }]),
      getCommitPaths: jest.fn().mockResolvedValue(['a.txt']),
      getCommitMessage: jest.fn().mockResolvedValue('Tidy'),
      markCommitted: jest.fn().mockResolvedValue(undefined),
    };
  });

  test('runs every call under a spinner and returns its result', async () => {
    const service = new ProgressReviewService(inner);

    await expect(service.findCommittableRevisions('USER-1')).resolves.toEqual([
      { id: 7, name: 'Tidy', sourcePath: null },
    ]);
    await expect(service.getCommitPaths(7)).resolves.toEqual(['a.txt']);
    await expect(service.getCommitMessage(7)).resolves.toBe('Tidy');
    await service.markCommitted(7);

    expect(inner.findCommittableRevisions).toHaveBeenCalledWith('USER-1');
    expect(inner.markCommitted).toHaveBeenCalledWith(7);
    expect(mockWrap.mock.calls.map(([text]) => text)).toEqual([
      'Looking up committable revisions',
      'Fetching the paths of D7',
      'Fetching the commit message of D7',
      'Marking D7 committed',
    ]);
  });

  test('passes failures through', async () => {
    inner.getCommitPaths.mockRejectedValue(new Error('ERR-CONDUIT-CORE'));

    await expect(new ProgressReviewService(inner).getCommitPaths(7)).rejects.toThrow(
      'ERR-CONDUIT-CORE'
    );
  });
});
