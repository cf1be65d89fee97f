// Review types
export type {
  Review,
  BranchSide,
  ReviewCreateData,
  BranchStatusUpdate,
} from './review';

// Comment types
export type { Comment, CommentTarget, CommentMetadata } from './comment';

// File view types
export type { FileView } from './fileView';

// Diff types
export type { Diff, DiffFile, FileStatus } from './diff';

// Config types
export type { LocalReviewConfig, LogLevel } from './config';

// Loading state
export type { LoadingState } from './loading';
