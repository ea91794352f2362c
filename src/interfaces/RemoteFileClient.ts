/**
 * A file reported by the remote server's directory listing
 */
export interface RemoteFile {
  /** File name relative to the listed directory */
  name: string;

  /** Size in bytes */
  size: number;

  /** Modification time from the listing, null when the listing has none */
  modifiedAt: Date | null;
}

/**
 * One session with a remote file-transfer server
 */
export interface RemoteFileClient {
  /** Open the connection and authenticate */
  connect(): Promise<void>;

  /** Change the working directory of the session */
  changeDirectory(remoteDirectory: string): Promise<void>;

  /** List regular files in the working directory */
  list(): Promise<RemoteFile[]>;

  /** Ask the server for a file's modification time */
  lastModified(remoteName: string): Promise<Date>;

  /** Upload a local file into the working directory */
  upload(localPath: string, remoteName: string): Promise<void>;

  /** Delete a file from the working directory */
  delete(remoteName: string): Promise<void>;

  /** Close the session; safe to call more than once */
  close(): void;
}

export type RemoteFileClientFactory = () => RemoteFileClient;
