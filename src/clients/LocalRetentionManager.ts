import { promises as fs } from 'fs';
import { join } from 'path';
import {
  LocalCleanupResult,
  LocalRetentionManager as ILocalRetentionManager,
} from '../interfaces/RetentionManager';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { CleanupFailedError, errorCode, formatError, toError } from '../errors/BackupError';
import { STAGING_PREFIX, isArchiveFileName } from '../utils/archiveNaming';

/**
 * Keeps the backup directory down to a single generation.
 * Every archive left by an earlier run is removed before the new one is written;
 * long-term history lives on the remote server only.
 */
export class LocalRetentionManager implements ILocalRetentionManager {
  private backupDirectory: string;
  private archivePrefix: string;
  private logger: Logger;

  constructor(config: BackupConfig, logger: Logger) {
    this.backupDirectory = config.backupDirectory;
    this.archivePrefix = config.archivePrefix;
    this.logger = logger;
  }

  async cleanup(): Promise<LocalCleanupResult> {
    const result: LocalCleanupResult = {
      deletedFiles: [],
      errors: [],
    };

    let entries: string[];
    try {
      entries = await fs.readdir(this.backupDirectory);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.info(`Backup directory ${this.backupDirectory} does not exist yet, nothing to clean up`);
        return result;
      }

      const cleanupError = new CleanupFailedError(
        `Failed to read backup directory ${this.backupDirectory}: ${formatError(error)}`,
        this.backupDirectory,
        toError(error)
      );
      result.errors.push(cleanupError);
      this.logger.error(cleanupError.message, cleanupError);
      return result;
    }

    await this.removeStaleStaging(entries);

    const archives = entries.filter(name => isArchiveFileName(this.archivePrefix, name)).sort();
    if (archives.length === 0) {
      this.logger.info('No previous backup found to delete');
      return result;
    }

    for (const archive of archives) {
      const filePath = join(this.backupDirectory, archive);
      try {
        await fs.unlink(filePath);
        result.deletedFiles.push(archive);
        this.logger.info(`Deleted previous backup file: ${archive}`);
      } catch (error) {
        const cleanupError = new CleanupFailedError(
          `Failed to delete previous backup ${archive}: ${formatError(error)}`,
          filePath,
          toError(error)
        );
        result.errors.push(cleanupError);
        this.logger.error(cleanupError.message, cleanupError);
      }
    }

    return result;
  }

  /**
   * Scratch directories survive only when a run was interrupted
   */
  private async removeStaleStaging(entries: string[]): Promise<void> {
    for (const entry of entries.filter(name => name.startsWith(STAGING_PREFIX))) {
      try {
        await fs.rm(join(this.backupDirectory, entry), { recursive: true, force: true });
        this.logger.info(`Removed leftover staging directory: ${entry}`);
      } catch (error) {
        this.logger.warn(`Failed to remove leftover staging directory ${entry}`, {
          error: formatError(error),
        });
      }
    }
  }
}
