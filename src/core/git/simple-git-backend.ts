import { simpleGit, SimpleGit } from 'simple-git';
import { ExternalError, errorMessage } from '@/core/exceptions';
import { BranchName, MergeTarget, Scope } from '@/core/retention';
import { logger } from '@/utils/logger';
import { DeletionResult, GitBackend } from './types';

const LOCAL_REF_PREFIX = 'refs/heads/';
const REMOTE_REF_PREFIX = 'refs/remotes/';
const REF_FORMAT = '--format=%(refname)';

/**
 * Git access through simple-git, which shells out to the git CLI.
 */
export class SimpleGitBackend implements GitBackend {
  constructor(
    private readonly git: SimpleGit,
    readonly gitDir: string
  ) {}

  /**
   * Open the repository containing `dir`.
   */
  static async open(dir: string): Promise<SimpleGitBackend> {
    const git = simpleGit(dir);

    let isRepo: boolean;
    try {
      isRepo = await git.checkIsRepo();
    } catch (error) {
      throw new ExternalError('open', error);
    }
    if (!isRepo) {
      throw new ExternalError(
        'open',
        new Error('fatal: not a git repository (or any of the parent directories)')
      );
    }

    const gitDir = await SimpleGitBackend.run('rev-parse', () =>
      git.revparse(['--absolute-git-dir'])
    );
    return new SimpleGitBackend(git, gitDir.trim());
  }

  async listMerged(target: MergeTarget, scope: Scope): Promise<BranchName[]> {
    if (scope.kind === 'local') {
      const [refs, current] = await Promise.all([
        this.mergedRefs('branch --merged', ['branch', '--merged', target, REF_FORMAT]),
        this.currentBranch(),
      ]);
      const excluded = new Set([current, target]);

      return this.namesUnder(refs, LOCAL_REF_PREFIX).filter((name) => !excluded.has(name));
    }

    const remotePrefix = `${scope.remote}/`;
    const [refs, upstream] = await Promise.all([
      this.mergedRefs('branch -r --merged', [
        'branch',
        '-r',
        '--merged',
        target,
        REF_FORMAT,
      ]),
      this.upstreamBranch(),
    ]);

    const excluded = new Set<string>(['HEAD', stripPrefix(target, remotePrefix)]);
    if (upstream?.startsWith(remotePrefix)) {
      excluded.add(stripPrefix(upstream, remotePrefix));
    }

    return this.namesUnder(refs, `${REMOTE_REF_PREFIX}${remotePrefix}`).filter(
      (name) => !excluded.has(name)
    );
  }

  async deleteBranches(
    branches: readonly BranchName[],
    scope: Scope
  ): Promise<DeletionResult[]> {
    if (branches.length === 0) return [];

    if (scope.kind === 'remote') {
      return this.deleteRemoteBranches(scope.remote, branches);
    }

    const results: DeletionResult[] = [];
    for (const branch of branches) {
      try {
        await this.git.deleteLocalBranch(branch);
        results.push({ branch, success: true });
      } catch (error) {
        logger.debug(`git branch -d ${branch} failed`, error);
        results.push({ branch, success: false, message: errorMessage(error).trim() });
      }
    }
    return results;
  }

  /**
   * One push for the whole batch. git applies the deletions ref by ref, so a
   * rejected push may still have removed some branches; the remote is asked
   * which ones are left and those carry git's message.
   */
  private async deleteRemoteBranches(
    remote: string,
    branches: readonly BranchName[]
  ): Promise<DeletionResult[]> {
    try {
      await this.git.push(remote, undefined, ['--delete', ...branches]);
      return branches.map((branch) => ({ branch, success: true }));
    } catch (pushError) {
      const message = errorMessage(pushError).trim();
      logger.debug(`git push ${remote} --delete failed`, pushError);

      let remaining: Set<BranchName>;
      try {
        remaining = await this.remoteHeads(remote, branches);
      } catch (listError) {
        logger.debug(`git ls-remote ${remote} failed`, listError);
        throw new ExternalError('push --delete', pushError);
      }

      return branches.map((branch) =>
        remaining.has(branch) ? { branch, success: false, message } : { branch, success: true }
      );
    }
  }

  /**
   * Which of `branches` still exist on the remote
   */
  private async remoteHeads(
    remote: string,
    branches: readonly BranchName[]
  ): Promise<Set<BranchName>> {
    const output = await this.git.raw(['ls-remote', '--heads', remote, ...branches]);
    const names = output
      .split('\n')
      .map((line) => line.trim().split('\t')[1] ?? '')
      .filter((ref) => ref.startsWith(LOCAL_REF_PREFIX))
      .map((ref) => ref.slice(LOCAL_REF_PREFIX.length));
    return new Set(names);
  }

  /**
   * The checked-out branch, or null on a detached HEAD
   */
  async currentBranch(): Promise<BranchName | null> {
    const name = await SimpleGitBackend.run('rev-parse', () =>
      this.git.revparse(['--abbrev-ref', 'HEAD'])
    );
    const trimmed = name.trim();
    return trimmed === 'HEAD' || trimmed === '' ? null : trimmed;
  }

  /**
   * `<remote>/<branch>` the current branch tracks, or null when there is none
   */
  async upstreamBranch(): Promise<string | null> {
    try {
      const upstream = await this.git.revparse([
        '--abbrev-ref',
        '--symbolic-full-name',
        '@{u}',
      ]);
      return upstream.trim() || null;
    } catch (error) {
      logger.debug('No upstream branch configured', error);
      return null;
    }
  }

  private async mergedRefs(operation: string, args: string[]): Promise<string[]> {
    const output = await SimpleGitBackend.run(operation, () => this.git.raw(args));
    return output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  private namesUnder(refs: string[], prefix: string): BranchName[] {
    return refs
      .filter((ref) => ref.startsWith(prefix))
      .map((ref) => ref.slice(prefix.length))
      .filter((name) => name.length > 0);
  }

  private static async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new ExternalError(operation, error);
    }
  }
}

const stripPrefix = (value: string, prefix: string): string =>
  value.startsWith(prefix) ? value.slice(prefix.length) : value;
