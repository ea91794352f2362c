/**
 * One backup generation on local disk
 */
export interface ArchiveInfo {
  /** File name, e.g. backup-2024-01-02.zip */
  fileName: string;

  /** Absolute path of the archive */
  filePath: string;

  /** Size of the archive in bytes */
  fileSize: number;

  /** Time the archive was written */
  createdAt: Date;
}

export interface LocalArchiver {
  /** Build the archive for the generation dated `runDate` */
  createArchive(runDate: Date): Promise<ArchiveInfo>;

  /** Check that the site directory exists and is readable */
  verifySource(): Promise<void>;
}
