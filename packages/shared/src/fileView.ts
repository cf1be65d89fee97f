/**
 * Marker that a file has been reviewed in its current content.
 * At most one per (reviewId, filePath).
 */
export interface FileView {
  reviewId: string;
  filePath: string;
  createdAt: string;
}
