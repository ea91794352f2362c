import archiver from 'archiver';
import { constants, createWriteStream, promises as fs } from 'fs';
import { dirname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ArchiveInfo, LocalArchiver as ILocalArchiver } from '../interfaces/LocalArchiver';
import { BackupConfig } from '../interfaces/BackupConfig';
import { DatabaseDumper } from '../interfaces/DatabaseDumper';
import { Logger } from '../interfaces/Logger';
import {
  ArchiveWriteFailedError,
  BackupError,
  DumpFailedError,
  SourceUnavailableError,
  errorCode,
  formatError,
  toError,
} from '../errors/BackupError';
import { STAGING_PREFIX, buildArchiveFileName } from '../utils/archiveNaming';

/** Top-level entry holding the copy of the site tree */
export const SITE_ENTRY = 'site_data';

/** Top-level entry holding the database dump */
export const DUMP_ENTRY = 'database_backup.sql';

/**
 * Builds one zip per run from a staged copy of the site tree and a fresh
 * database dump. The staging directory is removed on every exit path.
 */
export class LocalArchiver implements ILocalArchiver {
  private sitePath: string;
  private backupDirectory: string;
  private archivePrefix: string;
  private compressionLevel: number;
  private dumper: DatabaseDumper;
  private logger: Logger;

  constructor(config: BackupConfig, dumper: DatabaseDumper, logger: Logger) {
    this.sitePath = config.sitePath;
    this.backupDirectory = config.backupDirectory;
    this.archivePrefix = config.archivePrefix;
    this.compressionLevel = config.compressionLevel;
    this.dumper = dumper;
    this.logger = logger;
  }

  async verifySource(): Promise<void> {
    let stats;
    try {
      stats = await fs.stat(this.sitePath);
      await fs.access(this.sitePath, constants.R_OK);
    } catch (error) {
      throw new SourceUnavailableError(
        `Site directory ${this.sitePath} is not available: ${formatError(error)}`,
        this.sitePath,
        toError(error)
      );
    }

    if (!stats.isDirectory()) {
      throw new SourceUnavailableError(`Site path ${this.sitePath} is not a directory`, this.sitePath);
    }
  }

  async createArchive(runDate: Date): Promise<ArchiveInfo> {
    await this.verifySource();
    await this.ensureBackupDirectory();

    const fileName = buildArchiveFileName(this.archivePrefix, runDate);
    const filePath = join(this.backupDirectory, fileName);
    const stagingDir = join(this.backupDirectory, `${STAGING_PREFIX}${uuidv4()}`);
    const siteCopy = join(stagingDir, SITE_ENTRY);
    const dumpPath = join(stagingDir, 'database', DUMP_ENTRY);

    try {
      await this.stageSiteFiles(siteCopy);
      this.logger.info('Site files copied successfully', { sitePath: this.sitePath });

      await this.createDump(dumpPath);
      this.logger.info('Database dump completed successfully', { engine: this.dumper.engine });

      await this.writeArchive(filePath, siteCopy, dumpPath);
      const stats = await fs.stat(filePath);

      this.logger.info(`Backup zipped successfully: ${filePath}`, { fileSize: stats.size });

      return {
        fileName,
        filePath,
        fileSize: stats.size,
        createdAt: new Date(),
      };
    } catch (error) {
      if (error instanceof BackupError) {
        throw error;
      }
      throw new ArchiveWriteFailedError(
        `Failed to create archive ${filePath}: ${formatError(error)}`,
        toError(error)
      );
    } finally {
      await this.removeStaging(stagingDir);
    }
  }

  private async ensureBackupDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.backupDirectory, { recursive: true });
      await fs.access(this.backupDirectory, constants.W_OK);
    } catch (error) {
      throw new ArchiveWriteFailedError(
        `Backup directory ${this.backupDirectory} is not writable: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  private async stageSiteFiles(destination: string): Promise<void> {
    try {
      await fs.mkdir(dirname(destination), { recursive: true });
      await fs.cp(this.sitePath, destination, { recursive: true, preserveTimestamps: true });
    } catch (error) {
      throw new ArchiveWriteFailedError(
        `Failed to stage site files into ${destination}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  private async createDump(dumpPath: string): Promise<void> {
    try {
      await this.dumper.createDump(dumpPath);
    } catch (error) {
      if (error instanceof DumpFailedError) {
        throw error;
      }
      throw new DumpFailedError(
        `Database dump failed: ${formatError(error)}`,
        undefined,
        toError(error)
      );
    }
  }

  private async writeArchive(filePath: string, siteCopy: string, dumpPath: string): Promise<void> {
    try {
      await new Promise<void>((resolve, reject) => {
        const output = createWriteStream(filePath);
        const archive = archiver('zip', { zlib: { level: this.compressionLevel } });
        let failed = false;

        const fail = (error: Error): void => {
          if (failed) {
            return;
          }
          failed = true;
          archive.abort();
          output.destroy();
          reject(error);
        };

        output.on('close', () => {
          if (!failed) {
            resolve();
          }
        });
        output.on('error', fail);
        archive.on('error', fail);
        archive.on('warning', warning => {
          this.logger.warn('Archive warning', { error: formatError(warning) });
        });

        archive.pipe(output);
        archive.directory(siteCopy, SITE_ENTRY);
        archive.file(dumpPath, { name: DUMP_ENTRY });
        archive.finalize().catch(fail);
      });
    } catch (error) {
      await this.removePartialArchive(filePath);
      throw new ArchiveWriteFailedError(
        `Failed to write archive ${filePath}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  private async removePartialArchive(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn(`Failed to remove partial archive ${filePath}`, { error: formatError(error) });
      }
    }
  }

  private async removeStaging(stagingDir: string): Promise<void> {
    try {
      await fs.rm(stagingDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Failed to remove staging directory ${stagingDir}`, {
        error: formatError(error),
      });
    }
  }
}
