import { LogLevel } from './Logger';

export type DatabaseEngine = 'mysql' | 'postgres';

export interface DatabaseConfig {
  engine: DatabaseEngine;
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
}

export interface RemoteConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  remoteDirectory: string;
  secure: boolean;
  timeoutMs: number;
}

export interface BackupConfig {
  sitePath: string;
  backupDirectory: string;
  logFile: string;
  archivePrefix: string;
  compressionLevel: number;
  database: DatabaseConfig;
  remote: RemoteConfig;
  retentionDays: number; // 0 disables remote deletion
  schedule?: string; // cron format
  logLevel: LogLevel;
}
