import { BackupErrorKind } from '../errors/BackupError';
import { LocalCleanupResult, RetentionResult } from './RetentionManager';

/**
 * Result of a backup run
 */
export interface BackupRunResult {
  /** Whether the archive was created and uploaded */
  success: boolean;

  /** Name of the archive file created */
  archiveName: string;

  /** Local path of the archive */
  archivePath: string;

  /** Size of the archive in bytes */
  archiveSize: number;

  /** Remote location the archive was uploaded to */
  remotePath: string;

  /** Duration of the run in milliseconds */
  duration: number;

  /** Outcome of removing the previous local generation */
  localCleanup?: LocalCleanupResult;

  /** Outcome of the remote retention sweep, absent when it did not run */
  remoteRetention?: RetentionResult;

  /** Recoverable failures (local cleanup, remote retention) */
  warnings: string[];

  /** Error message if the run failed */
  error?: string;

  /** Kind of the fatal error, when it was a known backup failure */
  errorKind?: BackupErrorKind;
}

/**
 * Interface for the main backup orchestration manager
 */
export interface BackupManager {
  /** Execute one complete backup run */
  executeBackup(runDate?: Date): Promise<BackupRunResult>;

  /** Validate the current configuration against the real resources */
  validateConfiguration(): Promise<boolean>;
}
