export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * User configuration stored in .local-review/config.json
 */
export interface LocalReviewConfig {
  tickRateMs: number;
  logLevel: LogLevel;
  /** absolute path; defaults to .local-review/reviews.db inside the repository */
  databasePath: string;
  checkBranchStatusOnStart: boolean;
}
