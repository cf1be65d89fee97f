/**
 * A persisted comparison between a base branch and a target branch.
 *
 * `baseSha` / `targetSha` are the heads the user last acknowledged. A newly
 * observed head that differs from them is parked in `*ShaChanged` until the
 * user accepts it with a refresh.
 */
export interface Review {
  id: string;
  baseBranch: string;
  targetBranch: string;
  baseSha: string;
  targetSha: string;
  baseShaChanged: string | null;
  targetShaChanged: string | null;
  /** null until the branch has been probed at least once */
  baseBranchExists: boolean | null;
  targetBranchExists: boolean | null;
  createdAt: string;
  updatedAt: string;
}

export type BranchSide = 'base' | 'target';

export interface ReviewCreateData {
  baseBranch: string;
  targetBranch: string;
}

/**
 * Values written by a branch probe. Only the fields present are updated.
 */
export interface BranchStatusUpdate {
  baseShaChanged?: string | null;
  targetShaChanged?: string | null;
  baseBranchExists?: boolean;
  targetBranchExists?: boolean;
}
