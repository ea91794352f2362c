import {
  RemoteRetentionManager as IRemoteRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import {
  RemoteFile,
  RemoteFileClient,
  RemoteFileClientFactory,
} from '../interfaces/RemoteFileClient';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import {
  ListingFailedError,
  RemoteDeleteFailedError,
  formatError,
  toError,
} from '../errors/BackupError';
import { isArchiveFileName, parseArchiveDate } from '../utils/archiveNaming';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Deletes remote archives older than the retention window.
 * The sweep is best effort: a rejected delete is recorded and the remaining
 * files are still processed.
 */
export class RemoteRetentionManager implements IRemoteRetentionManager {
  private createClient: RemoteFileClientFactory;
  private retentionDays: number;
  private remoteDirectory: string;
  private archivePrefix: string;
  private logger: Logger;

  constructor(createClient: RemoteFileClientFactory, config: BackupConfig, logger: Logger) {
    this.createClient = createClient;
    this.retentionDays = config.retentionDays;
    this.remoteDirectory = config.remote.remoteDirectory;
    this.archivePrefix = config.archivePrefix;
    this.logger = logger;
  }

  /**
   * Clean up expired archives.
   * Throws ListingFailedError when the remote directory cannot be enumerated.
   */
  async cleanupExpiredBackups(now: Date = new Date()): Promise<RetentionResult> {
    const result: RetentionResult = {
      deletedCount: 0,
      totalCount: 0,
      deletedFiles: [],
      skippedFiles: [],
      errors: [],
    };

    if (this.retentionDays === 0) {
      this.logger.info('Remote retention disabled (retention days is 0), keeping all backups');
      return result;
    }

    this.logger.info(`Starting remote retention cleanup with ${this.retentionDays} day retention policy`);

    const client = this.createClient();
    try {
      let files: RemoteFile[];
      try {
        await client.connect();
        await client.changeDirectory(this.remoteDirectory);
        files = await client.list();
      } catch (error) {
        if (error instanceof ListingFailedError) {
          throw error;
        }
        throw new ListingFailedError(
          `Failed to list remote backups in ${this.remoteDirectory}: ${formatError(error)}`,
          toError(error)
        );
      }

      const archives = files
        .filter(file => isArchiveFileName(this.archivePrefix, file.name))
        .sort((a, b) => a.name.localeCompare(b.name));
      result.totalCount = archives.length;

      if (archives.length === 0) {
        this.logger.info(`No backups found in remote directory: ${this.remoteDirectory}`);
        return result;
      }

      for (const listed of archives) {
        const file = await this.withModificationTime(client, listed);
        const ageInDays = this.getAgeInDays(file, now);

        if (ageInDays === null) {
          result.skippedFiles.push(file.name);
          this.logger.warn(`Skipped remote file with unknown date: ${file.name}`);
          continue;
        }

        if (!this.isBackupExpired(ageInDays)) {
          this.logger.debug(`Keeping backup: ${file.name} (age: ${ageInDays} days)`);
          continue;
        }

        try {
          await client.delete(file.name);
          result.deletedCount++;
          result.deletedFiles.push(file.name);
          this.logger.info(`Deleted old backup from remote server: ${file.name} (age: ${ageInDays} days)`);
        } catch (error) {
          const deletionError =
            error instanceof RemoteDeleteFailedError
              ? error
              : new RemoteDeleteFailedError(
                  `Failed to delete backup ${file.name}: ${formatError(error)}`,
                  file.name,
                  toError(error)
                );
          result.errors.push(deletionError);
          this.logger.error(deletionError.message, deletionError);
        }
      }
    } finally {
      client.close();
    }

    this.logger.logRetentionCleanup(result.deletedCount, this.retentionDays);

    if (result.errors.length > 0) {
      this.logger.warn(
        `Retention cleanup had ${result.errors.length} errors. Some backups may not have been deleted.`
      );
    }

    return result;
  }

  /**
   * Fill in a missing listing time from the server. When the server cannot
   * tell, the time stays empty and the date in the name is used instead.
   */
  private async withModificationTime(client: RemoteFileClient, file: RemoteFile): Promise<RemoteFile> {
    if (file.modifiedAt) {
      return file;
    }

    try {
      return { ...file, modifiedAt: await client.lastModified(file.name) };
    } catch (error) {
      this.logger.warn(`No modification time for ${file.name}, using the date in its name`, {
        reason: formatError(error),
      });
      return file;
    }
  }

  /**
   * An archive is expired once its age is strictly greater than the window.
   * A window of 0 days disables deletion.
   */
  isBackupExpired(ageInDays: number): boolean {
    if (this.retentionDays === 0) {
      return false;
    }
    return ageInDays > this.retentionDays;
  }

  /**
   * Age in whole days, taken from the server's modification time and falling
   * back to the date in the archive name
   */
  getAgeInDays(file: RemoteFile, now: Date): number | null {
    const reference = file.modifiedAt ?? parseArchiveDate(this.archivePrefix, file.name);
    if (!reference || isNaN(reference.getTime())) {
      return null;
    }

    const elapsed = now.getTime() - reference.getTime();
    return Math.max(0, Math.floor(elapsed / DAY_MS));
  }
}
