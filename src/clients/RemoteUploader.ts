import { ArchiveInfo } from '../interfaces/LocalArchiver';
import { RemoteFileClientFactory } from '../interfaces/RemoteFileClient';
import { RemoteUploader as IRemoteUploader, UploadResult } from '../interfaces/RemoteUploader';
import { RemoteConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { BackupError, TransferFailedError, formatError, toError } from '../errors/BackupError';
import { buildRemotePath } from '../utils/archiveNaming';

/**
 * Transfers one archive into the configured remote directory.
 * The session is closed whatever the outcome; a failed transfer is not retried.
 */
export class RemoteUploader implements IRemoteUploader {
  private createClient: RemoteFileClientFactory;
  private remoteDirectory: string;
  private host: string;
  private logger: Logger;

  constructor(createClient: RemoteFileClientFactory, config: RemoteConfig, logger: Logger) {
    this.createClient = createClient;
    this.remoteDirectory = config.remoteDirectory;
    this.host = config.host;
    this.logger = logger;
  }

  async upload(archive: ArchiveInfo): Promise<UploadResult> {
    const client = this.createClient();

    try {
      this.logger.debug(`Connecting to remote server ${this.host}`);
      await client.connect();
      await client.changeDirectory(this.remoteDirectory);

      const startTime = Date.now();
      await client.upload(archive.filePath, archive.fileName);

      const remotePath = buildRemotePath(this.remoteDirectory, archive.fileName);
      this.logger.info(`Backup uploaded to remote server: ${archive.fileName}`, {
        remotePath,
        fileSize: archive.fileSize,
        duration: Date.now() - startTime,
      });

      return { remotePath };
    } catch (error) {
      if (error instanceof BackupError) {
        throw error;
      }
      throw new TransferFailedError(
        `Failed to upload ${archive.fileName}: ${formatError(error)}`,
        toError(error)
      );
    } finally {
      client.close();
    }
  }
}
