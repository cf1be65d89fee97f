import type { BranchSide, Review } from '@local-review/shared';
import type { ErrorKind } from '../errors';

export interface RefreshOutcome {
  side: BranchSide;
  oldSha: string;
  newSha: string;
  /** new head does not descend from the old one */
  rebase: boolean;
  changedFiles: string[];
  /** viewed markers dropped because their file changed */
  removedFileViews: string[];
}

export type SideRefreshResult =
  | { side: BranchSide; ok: true; outcome: RefreshOutcome }
  | { side: BranchSide; ok: false; kind: ErrorKind; message: string };

export interface SideDrift {
  side: BranchSide;
  branch: string;
  currentSha: string;
  pendingSha: string;
  rebase: boolean;
}

export interface DriftReport {
  base: SideDrift | null;
  target: SideDrift | null;
  baseBranchExists: boolean | null;
  targetBranchExists: boolean | null;
}

export interface ProbeResult {
  review: Review;
  /** whether anything was written */
  changed: boolean;
}
