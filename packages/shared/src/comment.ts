export interface Comment {
  id: string;
  reviewId: string;
  filePath: string;
  /** null for file-level comments */
  lineNumber: number | null;
  content: string;
  resolved: boolean;
  createdAt: string;
}

/**
 * Scope of a comments query: a whole file, or a single line of it.
 */
export interface CommentTarget {
  reviewId: string;
  filePath: string;
  lineNumber: number | null;
}

export interface CommentMetadata {
  filesWithComments: string[];
  /** file path -> line numbers carrying at least one comment */
  linesWithComments: Record<string, number[]>;
}
