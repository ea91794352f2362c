import { BackupManager as IBackupManager, BackupRunResult } from '../interfaces/BackupManager';
import { BackupConfig } from '../interfaces/BackupConfig';
import { DatabaseDumper } from '../interfaces/DatabaseDumper';
import { LocalArchiver } from '../interfaces/LocalArchiver';
import { Logger } from '../interfaces/Logger';
import { RemoteFileClientFactory } from '../interfaces/RemoteFileClient';
import { RemoteUploader } from '../interfaces/RemoteUploader';
import {
  LocalCleanupResult,
  LocalRetentionManager,
  RemoteRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { BackupError, asError, formatError, toError } from '../errors/BackupError';

export interface BackupComponents {
  localRetention: LocalRetentionManager;
  archiver: LocalArchiver;
  dumper: DatabaseDumper;
  uploader: RemoteUploader;
  remoteRetention: RemoteRetentionManager;
  createRemoteClient: RemoteFileClientFactory;
}

/**
 * BackupManager runs one backup as a linear pipeline:
 * verify source, local cleanup, archive, upload, remote retention.
 * Archive and upload failures end the run; cleanup failures are logged and
 * the run carries on. Every external call is attempted once.
 */
export class BackupManager implements IBackupManager {
  private components: BackupComponents;
  private config: BackupConfig;
  private logger: Logger;

  constructor(components: BackupComponents, config: BackupConfig, logger: Logger) {
    this.components = components;
    this.config = config;
    this.logger = logger;
  }

  async executeBackup(runDate: Date = new Date()): Promise<BackupRunResult> {
    const startTime = Date.now();
    const runId = this.generateRunId(runDate);

    const result: BackupRunResult = {
      success: false,
      archiveName: '',
      archivePath: '',
      archiveSize: 0,
      remotePath: '',
      duration: 0,
      warnings: [],
    };

    this.logger.logRunStart({ runId, sitePath: this.config.sitePath });

    try {
      await this.runStep('verify-source', () => this.components.archiver.verifySource());

      result.localCleanup = await this.runLocalCleanup(result.warnings);

      const archive = await this.runStep('archive', () =>
        this.components.archiver.createArchive(runDate)
      );
      result.archiveName = archive.fileName;
      result.archivePath = archive.filePath;
      result.archiveSize = archive.fileSize;

      const upload = await this.runStep('upload', () => this.components.uploader.upload(archive));
      result.remotePath = upload.remotePath;

      result.remoteRetention = await this.runRemoteRetention(runDate, result.warnings);
      result.success = true;
    } catch (error) {
      result.error = formatError(error);
      if (error instanceof BackupError) {
        result.errorKind = error.kind;
      }
    }

    result.duration = Date.now() - startTime;
    this.logger.logRunComplete(result.success, result.duration);

    return result;
  }

  /**
   * Check the site directory, the database and the remote server, in that order
   */
  async validateConfiguration(): Promise<boolean> {
    try {
      this.logger.info('Validating configuration...');

      await this.components.archiver.verifySource();
      this.logger.info('Site directory check passed');

      const dbConnected = await this.components.dumper.testConnection();
      if (!dbConnected) {
        this.logger.error(`Database connection test failed (${this.components.dumper.engine})`);
        return false;
      }
      this.logger.info('Database connection test passed');

      const client = this.components.createRemoteClient();
      try {
        await client.connect();
        await client.changeDirectory(this.config.remote.remoteDirectory);
      } finally {
        client.close();
      }
      this.logger.info('Remote server connection test passed');

      return true;
    } catch (error) {
      this.logger.error('Configuration validation failed', toError(error));
      return false;
    }
  }

  /**
   * Run a fatal step, logging its start and its outcome
   */
  private async runStep<T>(step: string, operation: () => Promise<T>): Promise<T> {
    this.logger.logStepStart(step);
    try {
      const value = await operation();
      this.logger.logStepComplete(step);
      return value;
    } catch (error) {
      this.logger.logStepFailed(step, asError(error));
      throw error;
    }
  }

  private async runLocalCleanup(warnings: string[]): Promise<LocalCleanupResult> {
    this.logger.logStepStart('local-cleanup');

    let cleanup: LocalCleanupResult;
    try {
      cleanup = await this.components.localRetention.cleanup();
    } catch (error) {
      warnings.push(formatError(error));
      this.logger.logStepFailed('local-cleanup', asError(error));
      return { deletedFiles: [], errors: [] };
    }

    if (cleanup.errors.length > 0) {
      warnings.push(...cleanup.errors.map(error => error.message));
      this.logger.warn(
        `Local cleanup had ${cleanup.errors.length} errors, continuing with the new backup`
      );
    }

    this.logger.logStepComplete('local-cleanup', { deletedFiles: cleanup.deletedFiles });
    return cleanup;
  }

  private async runRemoteRetention(
    runDate: Date,
    warnings: string[]
  ): Promise<RetentionResult | undefined> {
    this.logger.logStepStart('remote-retention', { retentionDays: this.config.retentionDays });

    try {
      const retention = await this.components.remoteRetention.cleanupExpiredBackups(runDate);
      warnings.push(...retention.errors.map(error => error.message));
      this.logger.logStepComplete('remote-retention', {
        deletedCount: retention.deletedCount,
        totalCount: retention.totalCount,
      });
      return retention;
    } catch (error) {
      warnings.push(formatError(error));
      this.logger.logStepFailed('remote-retention', asError(error));
      this.logger.warn('Remote retention cleanup failed (backup still successful)');
      return undefined;
    }
  }

  /**
   * Generate unique run ID for tracking
   */
  private generateRunId(runDate: Date): string {
    const timestamp = runDate.toISOString().replace(/[:.]/g, '-');
    const random = Math.random().toString(36).substring(2, 8);
    return `backup-${timestamp}-${random}`;
  }
}
