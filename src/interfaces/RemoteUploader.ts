import { ArchiveInfo } from './LocalArchiver';

export interface UploadResult {
  /** Location of the archive on the remote server */
  remotePath: string;
}

export interface RemoteUploader {
  /** Transfer the archive into the configured remote directory */
  upload(archive: ArchiveInfo): Promise<UploadResult>;
}
