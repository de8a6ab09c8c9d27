import { BranchName, MergeTarget, Scope } from '@/core/retention';

export interface DeletionResult {
  branch: BranchName;
  success: boolean;
  /** git's own message when the deletion was refused */
  message?: string;
}

/**
 * Everything the sweep needs from version control.
 *
 * Implementations throw `ExternalError` for failures of the git call itself.
 */
export interface GitBackend {
  /**
   * Branches merged into `target`, in git's order, already narrowed to `scope`:
   * no current branch, no merge target, and for a remote no `HEAD` alias and
   * no upstream of the current branch. Remote names come without the prefix.
   */
  listMerged(target: MergeTarget, scope: Scope): Promise<BranchName[]>;

  deleteBranches(branches: readonly BranchName[], scope: Scope): Promise<DeletionResult[]>;
}
