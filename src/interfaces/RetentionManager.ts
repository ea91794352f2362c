import { CleanupFailedError, RemoteDeleteFailedError } from '../errors/BackupError';
import { RemoteFile } from './RemoteFileClient';

/**
 * Result of removing previous generations from the backup directory
 */
export interface LocalCleanupResult {
  /** Archive file names that were removed */
  deletedFiles: string[];

  /** Archives that could not be removed */
  errors: CleanupFailedError[];
}

/**
 * Keeps exactly one archive generation in the local backup directory
 */
export interface LocalRetentionManager {
  cleanup(): Promise<LocalCleanupResult>;
}

/**
 * Result of a remote retention sweep
 */
export interface RetentionResult {
  /** Number of archives that were deleted */
  deletedCount: number;

  /** Number of archives found in the remote directory */
  totalCount: number;

  /** Names of the deleted archives */
  deletedFiles: string[];

  /** Archives whose age could not be determined */
  skippedFiles: string[];

  /** Deletions the server rejected */
  errors: RemoteDeleteFailedError[];
}

/**
 * Removes remote archives that fall outside the retention window
 */
export interface RemoteRetentionManager {
  /**
   * Sweep the remote directory
   * @param now reference time for computing archive ages
   */
  cleanupExpiredBackups(now?: Date): Promise<RetentionResult>;

  /** Whether an archive of the given age in days should be deleted */
  isBackupExpired(ageInDays: number): boolean;

  /** Age in whole days of a remote archive, null when it cannot be told */
  getAgeInDays(file: RemoteFile, now: Date): number | null;
}
