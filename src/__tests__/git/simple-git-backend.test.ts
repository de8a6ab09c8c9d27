import { simpleGit, PushResult, SimpleGit } from 'simple-git';
import { ExternalError } from '../../core/exceptions';
import { SimpleGitBackend } from '../../core/git';
import { LOCAL, remoteScope } from '../../core/retention';

jest.mock('simple-git', () => ({
  simpleGit: jest.fn(),
}));

jest.mock('../../utils/logger', () => ({
  logger: {
    debug: jest.fn(),
  },
}));

type GitLike = Pick<SimpleGit, 'checkIsRepo' | 'revparse' | 'raw' | 'deleteLocalBranch' | 'push'>;

const makeGitMock = () => {
  const mock: jest.Mocked<GitLike> = {
    checkIsRepo: jest.fn(),
    revparse: jest.fn(),
    raw: jest.fn(),
    deleteLocalBranch: jest.fn(),
    push: jest.fn(),
  };
  return mock;
};

describe('SimpleGitBackend', () => {
  let git: jest.Mocked<GitLike>;
  let backend: SimpleGitBackend;

  beforeEach(() => {
    git = makeGitMock();
    backend = new SimpleGitBackend(git as unknown as SimpleGit, '/repo/.git');
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('open', () => {
    test('records the absolute git dir', async () => {
      jest.mocked(simpleGit).mockReturnValue(git as unknown as SimpleGit);
      git.checkIsRepo.mockResolvedValue(true);
      git.revparse.mockResolvedValue('/work/project/.git\n');

      const opened = await SimpleGitBackend.open('/work/project');

      expect(simpleGit).toHaveBeenCalledWith('/work/project');
      expect(git.revparse).toHaveBeenCalledWith(['--absolute-git-dir']);
      expect(opened.gitDir).toBe('/work/project/.git');
    });

    test('rejects a directory outside a repository', async () => {
      jest.mocked(simpleGit).mockReturnValue(git as unknown as SimpleGit);
      git.checkIsRepo.mockResolvedValue(false);

      const result = SimpleGitBackend.open('/tmp');

      await expect(result).rejects.toBeInstanceOf(ExternalError);
      await expect(result).rejects.toThrow(
        'fatal: not a git repository (or any of the parent directories)'
      );
    });
  });

  describe('listMerged (local)', () => {
    test('lists local branches without the current branch and the target', async () => {
      git.raw.mockResolvedValue(
        ['refs/heads/main', 'refs/heads/feature/a', 'refs/heads/develop', 'refs/heads/fix', ''].join(
          '\n'
        )
      );
      git.revparse.mockResolvedValue('fix\n');

      const names = await backend.listMerged('develop', LOCAL);

      expect(git.raw).toHaveBeenCalledWith([
        'branch',
        '--merged',
        'develop',
        '--format=%(refname)',
      ]);
      expect(git.revparse).toHaveBeenCalledWith(['--abbrev-ref', 'HEAD']);
      expect(names).toEqual(['main', 'feature/a']);
    });

    test('keeps every branch on a detached HEAD', async () => {
      git.raw.mockResolvedValue('refs/heads/a\nrefs/heads/b\n');
      git.revparse.mockResolvedValue('HEAD\n');

      await expect(backend.listMerged('origin/master', LOCAL)).resolves.toEqual(['a', 'b']);
    });

    test('wraps git failures with the operation name', async () => {
      git.raw.mockRejectedValue(new Error("fatal: malformed object name 'nope'"));
      git.revparse.mockResolvedValue('main');

      const result = backend.listMerged('nope', LOCAL);

      await expect(result).rejects.toThrow("fatal: malformed object name 'nope'");
      await expect(result).rejects.toMatchObject({ operation: 'branch --merged' });
    });
  });

  describe('listMerged (remote)', () => {
    test('strips the remote prefix and drops HEAD, the target and the upstream', async () => {
      git.raw.mockResolvedValue(
        [
          'refs/remotes/origin/HEAD',
          'refs/remotes/origin/master',
          'refs/remotes/origin/feature-a',
          'refs/remotes/origin/mine',
          'refs/remotes/upstream/feature-b',
        ].join('\n')
      );
      git.revparse.mockResolvedValue('origin/mine\n');

      const names = await backend.listMerged('origin/master', remoteScope('origin'));

      expect(git.raw).toHaveBeenCalledWith([
        'branch',
        '-r',
        '--merged',
        'origin/master',
        '--format=%(refname)',
      ]);
      expect(names).toEqual(['feature-a']);
    });

    test('ignores an upstream on another remote', async () => {
      git.raw.mockResolvedValue('refs/remotes/origin/mine\nrefs/remotes/origin/other\n');
      git.revparse.mockResolvedValue('upstream/mine');

      await expect(backend.listMerged('main', remoteScope('origin'))).resolves.toEqual([
        'mine',
        'other',
      ]);
    });

    test('drops a target given without the remote prefix', async () => {
      git.raw.mockResolvedValue('refs/remotes/origin/main\nrefs/remotes/origin/other\n');
      git.revparse.mockRejectedValue(new Error('fatal: no upstream configured'));

      await expect(backend.listMerged('main', remoteScope('origin'))).resolves.toEqual(['other']);
    });
  });

  describe('deleteBranches', () => {
    test('deletes local branches one by one and reports refusals', async () => {
      git.deleteLocalBranch
        .mockResolvedValueOnce({ branch: 'a', hash: 'abc1234', success: true })
        .mockRejectedValueOnce(new Error("error: the branch 'b' is not fully merged.\n"));

      const results = await backend.deleteBranches(['a', 'b'], LOCAL);

      expect(git.deleteLocalBranch).toHaveBeenNthCalledWith(1, 'a');
      expect(git.deleteLocalBranch).toHaveBeenNthCalledWith(2, 'b');
      expect(results).toEqual([
        { branch: 'a', success: true },
        { branch: 'b', success: false, message: "error: the branch 'b' is not fully merged." },
      ]);
    });

    test('deletes remote branches with a single push', async () => {
      git.push.mockResolvedValue({ pushed: [] } as unknown as PushResult);

      const results = await backend.deleteBranches(['a', 'b'], remoteScope('origin'));

      expect(git.push).toHaveBeenCalledWith('origin', undefined, ['--delete', 'a', 'b']);
      expect(results).toEqual([
        { branch: 'a', success: true },
        { branch: 'b', success: true },
      ]);
    });

    test('a partly rejected push reports the branches still on the remote', async () => {
      const message =
        "To /srv/git/project.git\n - [deleted]         gone\n ! [remote rejected] keep (hook declined)\n" +
        "error: failed to push some refs to '/srv/git/project.git'";
      git.push.mockRejectedValue(new Error(`${message}\n`));
      git.raw.mockResolvedValue('0123abcd\trefs/heads/keep\n4567ef01\trefs/heads/team/gone\n');

      const results = await backend.deleteBranches(['gone', 'keep'], remoteScope('origin'));

      expect(git.raw).toHaveBeenCalledWith(['ls-remote', '--heads', 'origin', 'gone', 'keep']);
      expect(results).toEqual([
        { branch: 'gone', success: true },
        { branch: 'keep', success: false, message },
      ]);
    });

    test('an unreachable remote surfaces the push error verbatim', async () => {
      git.push.mockRejectedValue(
        new Error("fatal: 'nowhere' does not appear to be a git repository")
      );
      git.raw.mockRejectedValue(new Error('fatal: could not read from remote repository'));

      const result = backend.deleteBranches(['a'], remoteScope('nowhere'));

      await expect(result).rejects.toThrow(
        "fatal: 'nowhere' does not appear to be a git repository"
      );
      await expect(result).rejects.toMatchObject({ operation: 'push --delete' });
    });

    test('does nothing for an empty list', async () => {
      await expect(backend.deleteBranches([], LOCAL)).resolves.toEqual([]);
      expect(git.deleteLocalBranch).not.toHaveBeenCalled();
    });
  });
});
