import { DatabaseEngine } from './BackupConfig';

export interface DatabaseDumper {
  readonly engine: DatabaseEngine;
  testConnection(): Promise<boolean>;
  createDump(outputPath: string): Promise<DumpInfo>;
}

export interface DumpInfo {
  filePath: string;
  fileSize: number;
  databaseName: string;
  timestamp: Date;
}
