import { Client, FileInfo, FileType } from 'basic-ftp';
import { RemoteConfig } from '../interfaces/BackupConfig';
import { RemoteFile, RemoteFileClient } from '../interfaces/RemoteFileClient';
import {
  ConnectionFailedError,
  ListingFailedError,
  RemoteDeleteFailedError,
  TransferFailedError,
  formatError,
  toError,
} from '../errors/BackupError';

/**
 * RemoteFileClient over FTP (optionally explicit FTPS) using basic-ftp
 */
export class FtpClient implements RemoteFileClient {
  private client: Client;
  private config: RemoteConfig;

  constructor(config: RemoteConfig) {
    this.config = config;
    this.client = new Client(config.timeoutMs);
  }

  async connect(): Promise<void> {
    try {
      await this.client.access({
        host: this.config.host,
        port: this.config.port,
        user: this.config.user,
        password: this.config.password,
        secure: this.config.secure,
      });
    } catch (error) {
      throw new ConnectionFailedError(
        `Failed to connect to ${this.config.host}:${this.config.port}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  async changeDirectory(remoteDirectory: string): Promise<void> {
    try {
      await this.client.cd(remoteDirectory);
    } catch (error) {
      throw new TransferFailedError(
        `Remote directory ${remoteDirectory} is not accessible: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  async list(): Promise<RemoteFile[]> {
    let entries: FileInfo[];
    try {
      entries = await this.client.list();
    } catch (error) {
      throw new ListingFailedError(
        `Failed to list remote directory: ${formatError(error)}`,
        toError(error)
      );
    }

    const files: RemoteFile[] = [];
    for (const entry of entries) {
      if (entry.type !== FileType.File) {
        continue;
      }

      files.push({
        name: entry.name,
        size: entry.size,
        modifiedAt: entry.modifiedAt ?? null,
      });
    }

    return files;
  }

  async upload(localPath: string, remoteName: string): Promise<void> {
    try {
      await this.client.uploadFrom(localPath, remoteName);
    } catch (error) {
      throw new TransferFailedError(
        `Failed to upload ${localPath} as ${remoteName}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  async delete(remoteName: string): Promise<void> {
    try {
      await this.client.remove(remoteName);
    } catch (error) {
      throw new RemoteDeleteFailedError(
        `Failed to delete remote file ${remoteName}: ${formatError(error)}`,
        remoteName,
        toError(error)
      );
    }
  }

  close(): void {
    if (!this.client.closed) {
      this.client.close();
    }
  }

  /**
   * Ask the server for a file's modification time (MDTM).
   * Servers that only answer LIST give no parsed date for older files.
   */
  async lastModified(remoteName: string): Promise<Date> {
    try {
      return await this.client.lastMod(remoteName);
    } catch (error) {
      throw new ListingFailedError(
        `Failed to read modification time of ${remoteName}: ${formatError(error)}`,
        toError(error)
      );
    }
  }
}
