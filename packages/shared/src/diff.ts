export type FileStatus = 'added' | 'modified' | 'deleted' | 'renamed';

/**
 * One file of a diff between the base and the target of a review.
 */
export interface DiffFile {
  path: string;
  status: FileStatus;
  additions: number;
  deletions: number;
  renamedFrom?: string;
  binary: boolean;
  /** unified patch text for this file, without the `diff --git` header */
  content: string;
}

export interface Diff {
  baseSha: string;
  targetSha: string;
  files: DiffFile[];
}
