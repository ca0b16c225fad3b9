import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { UsageException } from '../../core/exceptions';
import { WorkingCopy } from '../../core/working-copy';

jest.mock('../../utils/cli/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

describe('WorkingCopy.find', () => {
  let tmpDir: string;
  let userConfigPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'revcommit-wc-'));
    userConfigPath = path.join(tmpDir, 'no-user-config.json');
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  test('uses the top-most Subversion directory as the root', async () => {
    const root = path.join(tmpDir, 'checkout');
    const nested = path.join(root, 'lib', 'deep');
    await fs.ensureDir(path.join(root, '.svn'));
    await fs.ensureDir(path.join(root, 'lib', '.svn'));
    await fs.ensureDir(nested);

    const workingCopy = await WorkingCopy.find(nested, { userConfigPath });

    expect(workingCopy.root).toBe(root);
    expect(workingCopy.backendKind).toBe('svn');
  });

  test('roots a project at its .revcommit.json and loads it', async () => {
    const checkout = path.join(tmpDir, 'checkout');
    const project = path.join(checkout, 'trunk');
    await fs.ensureDir(path.join(checkout, '.svn'));
    await fs.ensureDir(path.join(project, 'src'));
    await fs.writeJson(path.join(project, '.revcommit.json'), {
      service: { uri: 'https://review.example.test' },
      workingCopy: { remoteHooksInstalled: true },
    });

    const workingCopy = await WorkingCopy.find(path.join(project, 'src'), { userConfigPath });

    expect(workingCopy.root).toBe(project);
    expect(workingCopy.backendKind).toBe('svn');
    expect(workingCopy.config.serviceUri).toBe('https://review.example.test');
    expect(workingCopy.config.remoteHooksInstalled).toBe(true);
  });

  test('applies command-line overrides on top of the files', async () => {
    await fs.ensureDir(path.join(tmpDir, '.svn'));
    await fs.writeJson(path.join(tmpDir, '.revcommit.json'), { user: { id: 'USER-1' } });

    const workingCopy = await WorkingCopy.find(tmpDir, {
      userConfigPath,
      overrides: ['user.id=USER-2'],
    });

    expect(workingCopy.config.userId).toBe('USER-2');
  });

  test('recognizes a Git working copy', async () => {
    const root = path.join(tmpDir, 'repo');
    await fs.ensureDir(path.join(root, '.git'));
    await fs.ensureDir(path.join(root, 'src'));

    const workingCopy = await WorkingCopy.find(path.join(root, 'src'), { userConfigPath });

    expect(workingCopy.root).toBe(root);
    expect(workingCopy.backendKind).toBe('git');
  });

  test('fails outside any working copy', async () => {
    await expect(WorkingCopy.find(tmpDir, { userConfigPath })).rejects.toBeInstanceOf(
      UsageException
    );
  });

  test('fails for a configured directory without version control', async () => {
    await fs.writeJson(path.join(tmpDir, '.revcommit.json'), {});

    await expect(WorkingCopy.find(tmpDir, { userConfigPath })).rejects.toThrow(
      `'${tmpDir}' is not under version control.`
    );
  });
});
